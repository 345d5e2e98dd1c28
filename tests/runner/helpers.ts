import { vi } from 'vitest';
import type { Condition, Module, ModuleResponse, Output, TaskContext } from '../../src/types/index.js';

export function mockModule(name: string, apply: (context: TaskContext) => Promise<ModuleResponse>): Module {
  return {
    name,
    apply: vi.fn(apply),
    destroy: vi.fn().mockResolvedValue({ changed: false }),
  };
}

export function okModule(output?: Output, changed = true): Module {
  return mockModule('mock', async () => ({ changed, output }));
}

export function mockCondition(evaluate: () => Promise<boolean>): Condition {
  return { name: 'mock', evaluate: vi.fn(evaluate) };
}
