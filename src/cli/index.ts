#!/usr/bin/env node

/**
 * playbook CLI - run task playbooks
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { runCommand } from './commands/run.js';

const program = new Command();

program.name('playbook').description('Run ordered task playbooks against a shared context').version('0.1.0');

program.addCommand(runCommand);
program.addCommand(checkCommand);

await program.parseAsync();
