import { ConditionError, errorMessage } from '../exception/errors.js';
import { runProcess, type ProcessRunner } from '../process/run-process.js';
import type { Condition } from '../types/index.js';

/** True when the external command exits with status 0. */
export class ExecuteCondition implements Condition {
  readonly name = 'execute';

  constructor(
    readonly command: string,
    readonly args: readonly string[] = [],
    private runner: ProcessRunner = runProcess,
  ) {}

  async evaluate(): Promise<boolean> {
    try {
      const result = await this.runner(this.command, this.args);
      return result.exitCode === 0;
    } catch (error) {
      throw new ConditionError(errorMessage(error), this.name);
    }
  }
}

/** Build an ExecuteCondition from a whitespace-separated command line. */
export function whenExecute(commandLine: string, runner?: ProcessRunner): ExecuteCondition {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return new ExecuteCondition(command, args, runner);
}
