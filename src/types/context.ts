import type { Value } from './value.js';

export interface Context {
  readonly vars: Readonly<Record<string, string>>;
  readonly state: Map<string, Value>;
}

/**
 * Read-only view of the run context handed to modules and lazy expressions.
 * Only the playbook driver writes state.
 */
export interface TaskContext {
  readonly vars: Readonly<Record<string, string>>;
  readonly state: ReadonlyMap<string, Value>;
}
