import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '../../exception/errors.js';
import { parseVar, runPlaybookFile } from '../run-playbook.js';

function collectVar(entry: string, previous: Record<string, string>): Record<string, string> {
  try {
    return parseVar(entry, previous);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

export const runCommand = new Command('run')
  .description('Run a playbook and stream results as JSON lines')
  .argument('<file>', 'Playbook JSON file')
  .option('--var <key=value>', 'Set a variable (repeatable, overrides the file)', collectVar, {})
  .option('--log-dir <dir>', 'Write logs.jsonl and summary.md under this directory (or set PLAYBOOK_LOG_DIR)')
  .action(async (file: string, options: { var: Record<string, string>; logDir?: string }) => {
    process.exitCode = await runPlaybookFile(file, { vars: options.var, logDir: options.logDir });
  });
