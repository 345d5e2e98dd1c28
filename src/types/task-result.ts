import type { EngineError } from '../exception/errors.js';
import type { Output } from './module.js';
import type { Value } from './value.js';

export interface TaskResult {
  module: string;
  description: string;
  succeeded: boolean;
  changed: boolean;
  skipped: boolean;
  error?: string;
  output?: Output;
  durationMs: number;
  /** Structured cause of a failure. Never serialized. */
  failure?: EngineError;
}

/** The record emitted on the result stream for each task. */
export interface ResultRecord {
  module: string;
  succeeded: boolean;
  changed: boolean;
  error?: string;
  output?: Value;
}
