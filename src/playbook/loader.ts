import { readFile } from 'node:fs/promises';
import { dirname, resolve as resolvePath } from 'node:path';
import { ZodError } from 'zod';
import { DEFAULT_CONFIG, type EngineConfig } from '../config.js';
import { PlaybookLoadError, errorMessage } from '../exception/errors.js';
import { createDefaultRegistry } from '../modules/builtins/index.js';
import type { ModuleRegistry } from '../modules/module-registry.js';
import type { StackApi } from '../modules/aws/stack-api.js';
import type { ProcessRunner } from '../process/run-process.js';
import { Playbook } from '../runner/playbook.js';
import { Task } from '../runner/task.js';
import { PlaybookFileSchema } from '../schemas/playbook.schema.js';
import type { EventSink, Module } from '../types/index.js';
import { buildCondition } from './conditions.js';

export interface LoadOptions {
  registry?: ModuleRegistry;
  config?: EngineConfig;
  /** Override variables declared in the file. */
  vars?: Record<string, string>;
  sinks?: EventSink[];
  /** Base for relative paths in module options. Defaults to the file's directory. */
  baseDir?: string;
  runner?: ProcessRunner;
  stackApi?: StackApi;
}

export async function loadPlaybook(path: string, options: LoadOptions = {}): Promise<Playbook> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PlaybookLoadError(`Cannot read playbook: ${errorMessage(error)}`, path);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new PlaybookLoadError(`Invalid JSON: ${errorMessage(error)}`, path);
  }

  return parsePlaybook(json, { baseDir: dirname(resolvePath(path)), ...options }, path);
}

/**
 * Validate a playbook document and build its tasks. Nothing in it is
 * evaluated until the playbook runs.
 */
export async function parsePlaybook(
  json: unknown,
  options: LoadOptions = {},
  source = '<inline>',
): Promise<Playbook> {
  const parsed = PlaybookFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new PlaybookLoadError(`Invalid playbook: ${formatIssues(parsed.error)}`, source);
  }

  const file = parsed.data;
  const registry = options.registry ?? createDefaultRegistry();
  const buildContext = {
    baseDir: options.baseDir ?? process.cwd(),
    config: options.config ?? DEFAULT_CONFIG,
    runner: options.runner,
    stackApi: options.stackApi,
  };

  const tasks: Task[] = [];
  for (const [index, spec] of file.tasks.entries()) {
    let module: Module;
    try {
      module = await registry.build(spec.module, buildContext);
    } catch (error) {
      const detail = error instanceof ZodError ? formatIssues(error) : errorMessage(error);
      throw new PlaybookLoadError(`Task ${index} ("${spec.description}"): ${detail}`, source);
    }
    tasks.push(new Task(spec.description, module, buildCondition(spec.when, options.runner)));
  }

  return new Playbook({
    name: file.name,
    tasks,
    vars: { ...file.vars, ...options.vars },
    sinks: options.sinks,
  });
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
