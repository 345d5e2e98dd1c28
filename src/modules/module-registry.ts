import { z } from 'zod';
import type { EngineConfig } from '../config.js';
import type { ProcessRunner } from '../process/run-process.js';
import type { Module } from '../types/index.js';
import type { StackApi } from './aws/stack-api.js';

export interface ModuleBuildContext {
  /** Directory that relative paths in module options resolve against. */
  baseDir: string;
  config: EngineConfig;
  runner?: ProcessRunner;
  stackApi?: StackApi;
}

export interface ModuleDefinition<T> {
  type: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  create(options: T, context: ModuleBuildContext): Module | Promise<Module>;
}

/** A definition with its option type erased; `build` validates raw options first. */
export interface RegisteredModule {
  type: string;
  description: string;
  build(raw: unknown, context: ModuleBuildContext): Promise<Module>;
}

export function defineModule<T>(definition: ModuleDefinition<T>): RegisteredModule {
  return {
    type: definition.type,
    description: definition.description,
    async build(raw, context) {
      const options = definition.schema.parse(raw);
      return definition.create(options, context);
    },
  };
}

/**
 * Named module constructors, so playbooks can be built from data.
 */
export class ModuleRegistry {
  private modules = new Map<string, RegisteredModule>();

  /**
   * Register a module type. Throws if the type is already registered.
   */
  register(module: RegisteredModule): void {
    if (this.modules.has(module.type)) {
      throw new Error(`Module "${module.type}" is already registered`);
    }
    this.modules.set(module.type, module);
  }

  get(type: string): RegisteredModule | undefined {
    return this.modules.get(type);
  }

  has(type: string): boolean {
    return this.modules.has(type);
  }

  list(): RegisteredModule[] {
    return Array.from(this.modules.values());
  }

  /**
   * Build a module from its raw `{ type, ...options }` spec.
   */
  async build(spec: { type: string }, context: ModuleBuildContext): Promise<Module> {
    const module = this.modules.get(spec.type);
    if (!module) {
      throw new Error(`Unknown module type "${spec.type}". Known types: ${this.list().map((m) => m.type).join(', ')}`);
    }
    return module.build(spec, context);
  }
}
