import type { ResultRecord } from './task-result.js';

export type RunStatus = 'pending' | 'running' | 'completed' | 'halted';

export type RunEvent =
  | { type: 'run_start'; runId: string; totalTasks: number }
  | { type: 'task_start'; runId: string; taskIndex: number; description: string; module: string }
  | {
      type: 'task_end';
      runId: string;
      taskIndex: number;
      description: string;
      durationMs: number;
      result: ResultRecord;
    }
  | {
      type: 'run_complete';
      runId: string;
      ok: boolean;
      status: RunStatus;
      totalDurationMs: number;
      haltedAt?: string;
    };

export interface EventSink {
  emit(event: RunEvent): void | Promise<void>;
}
