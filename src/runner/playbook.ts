import { errorMessage } from '../exception/errors.js';
import { toValue } from '../state/value.js';
import type {
  Context,
  EventSink,
  ResultRecord,
  RunEvent,
  RunStatus,
  TaskResult,
} from '../types/index.js';
import { createContext } from './context.js';
import type { Task } from './task.js';

export interface PlaybookOptions {
  tasks: Task[];
  vars?: Record<string, string>;
  sinks?: EventSink[];
  name?: string;
  runId?: string;
}

export interface PlaybookRunResult {
  runId: string;
  ok: boolean;
  status: RunStatus;
  results: TaskResult[];
  /** Description of the task that failed, when the run halted. */
  haltedAt?: string;
  durationMs: number;
  /** Output conversions and sink emissions that failed. They never fail the run. */
  warnings: string[];
}

/**
 * An ordered list of tasks sharing one context. Tasks run one at a time;
 * the first failure halts the run.
 */
export class Playbook {
  readonly name: string;
  readonly tasks: readonly Task[];
  readonly context: Context;
  readonly runId: string;
  private sinks: EventSink[];
  private _status: RunStatus = 'pending';

  constructor(options: PlaybookOptions) {
    this.name = options.name ?? 'playbook';
    this.tasks = [...options.tasks];
    this.context = createContext(options.vars);
    this.sinks = options.sinks ?? [];
    this.runId = options.runId ?? `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
  }

  get status(): RunStatus {
    return this._status;
  }

  async run(): Promise<PlaybookRunResult> {
    if (this._status !== 'pending') {
      throw new Error(`Playbook "${this.name}" has already run (status: ${this._status})`);
    }
    this._status = 'running';

    const start = Date.now();
    const results: TaskResult[] = [];
    const warnings: string[] = [];
    let haltedAt: string | undefined;

    await this.emit({ type: 'run_start', runId: this.runId, totalTasks: this.tasks.length }, warnings);

    for (let i = 0; i < this.tasks.length; i++) {
      const task = this.tasks[i];
      await this.emit(
        { type: 'task_start', runId: this.runId, taskIndex: i, description: task.description, module: task.module.name },
        warnings,
      );

      const result = await task.run(this.context);
      const record = toRecord(result, warnings);

      if (record.output !== undefined) {
        this.context.state.set(task.description, structuredClone(record.output));
      }

      await this.emit(
        {
          type: 'task_end',
          runId: this.runId,
          taskIndex: i,
          description: task.description,
          durationMs: result.durationMs,
          result: record,
        },
        warnings,
      );
      results.push(result);

      if (!result.succeeded) {
        haltedAt = task.description;
        break;
      }
    }

    this._status = haltedAt === undefined ? 'completed' : 'halted';
    const durationMs = Date.now() - start;

    await this.emit(
      {
        type: 'run_complete',
        runId: this.runId,
        ok: haltedAt === undefined,
        status: this._status,
        totalDurationMs: durationMs,
        ...(haltedAt !== undefined ? { haltedAt } : {}),
      },
      warnings,
    );

    return {
      runId: this.runId,
      ok: haltedAt === undefined,
      status: this._status,
      results,
      haltedAt,
      durationMs,
      warnings,
    };
  }

  private async emit(event: RunEvent, warnings: string[]): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.emit(event);
      } catch (error) {
        warnings.push(`emit ${event.type} failed: ${errorMessage(error)}`);
      }
    }
  }
}

/** Build the result-stream record, converting the output once. */
function toRecord(result: TaskResult, warnings: string[]): ResultRecord {
  const record: ResultRecord = {
    module: result.module,
    succeeded: result.succeeded,
    changed: result.changed,
  };
  if (result.error !== undefined) {
    record.error = result.error;
  }
  if (result.output !== undefined) {
    const converted = toValue(result.output);
    if (converted.ok) {
      record.output = converted.value;
    } else {
      warnings.push(`output of "${result.description}" is not a value: ${converted.error}`);
    }
  }
  return record;
}
