import { Always, ExecuteCondition, Never, whenExecute } from '../conditions/index.js';
import type { ProcessRunner } from '../process/run-process.js';
import type { ConditionSpec } from '../schemas/playbook.schema.js';
import type { Condition } from '../types/index.js';

export function buildCondition(spec: ConditionSpec, runner?: ProcessRunner): Condition {
  if (spec === 'always') return new Always();
  if (spec === 'never') return new Never();
  if ('execute' in spec) return whenExecute(spec.execute, runner);
  return new ExecuteCondition(spec.command, spec.args, runner);
}
