/**
 * playbook check command
 *
 * Loads a playbook, building every module, and lists its tasks without
 * running anything.
 */

import { Command } from 'commander';
import { errorMessage } from '../../exception/errors.js';
import { loadPlaybook } from '../../playbook/loader.js';

export const checkCommand = new Command('check')
  .description('Validate a playbook without running it')
  .argument('<file>', 'Playbook JSON file')
  .action(async (file: string) => {
    try {
      const playbook = await loadPlaybook(file);
      for (const task of playbook.tasks) {
        console.log(`${task.description} [${task.module.name}] when ${task.condition.name}`);
      }
    } catch (error) {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });
