import { ConditionError, ModuleError, errorMessage } from '../exception/errors.js';
import { Always } from '../conditions/always.js';
import type { Condition, Module, TaskContext, TaskResult } from '../types/index.js';

export class Task {
  constructor(
    readonly description: string,
    readonly module: Module,
    readonly condition: Condition = new Always(),
  ) {}

  /** Run the task. Every failure ends up in the result; this never rejects. */
  async run(context: TaskContext): Promise<TaskResult> {
    const start = Date.now();
    const base = { module: this.module.name, description: this.description };

    let proceed: boolean;
    try {
      proceed = await this.condition.evaluate();
    } catch (error) {
      const failure =
        error instanceof ConditionError ? error : new ConditionError(errorMessage(error), this.condition.name);
      return {
        ...base,
        succeeded: false,
        changed: false,
        skipped: false,
        error: failure.message,
        durationMs: Date.now() - start,
        failure,
      };
    }

    if (!proceed) {
      return { ...base, succeeded: true, changed: false, skipped: true, durationMs: Date.now() - start };
    }

    try {
      const response = await this.module.apply(context);
      return {
        ...base,
        succeeded: true,
        changed: response.changed,
        skipped: false,
        output: response.output,
        durationMs: Date.now() - start,
      };
    } catch (error) {
      const failure = error instanceof ModuleError ? error : new ModuleError(errorMessage(error), false);
      return {
        ...base,
        succeeded: false,
        changed: failure.changed,
        skipped: false,
        error: failure.description,
        durationMs: Date.now() - start,
        failure,
      };
    }
  }
}
