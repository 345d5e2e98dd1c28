import type { TaskContext } from './context.js';
import type { Value } from './value.js';

/** Anything a module returns that survives a JSON round trip into a Value. */
export type Output = Value | object;

export interface ModuleResponse {
  changed: boolean;
  output?: Output;
}

export interface Module {
  readonly name: string;
  /** Rejects with a ModuleError when the action fails. */
  apply(context: TaskContext): Promise<ModuleResponse>;
  /** Teardown hook. Not called by the playbook driver. */
  destroy(): Promise<ModuleResponse>;
}

export interface Condition {
  readonly name: string;
  /** Rejects with a ConditionError when the check itself cannot run. */
  evaluate(): Promise<boolean>;
}
