import { join } from 'node:path';
import { loadConfig, type EngineConfig } from '../config.js';
import { ConfigError, PlaybookLoadError } from '../exception/errors.js';
import { RunLogger } from '../logging/run-logger.js';
import { StdoutSink } from '../logging/sinks.js';
import { writeSummary } from '../logging/summary-writer.js';
import { loadPlaybook, type LoadOptions } from '../playbook/loader.js';
import type { Playbook } from '../runner/playbook.js';
import type { EventSink } from '../types/index.js';

export interface RunFileOptions {
  /** Environment read when `config` is not given. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  vars?: Record<string, string>;
  logDir?: string;
  config?: EngineConfig;
  out?: { write(chunk: string): unknown };
  load?: Pick<LoadOptions, 'registry' | 'runner' | 'stackApi'>;
}

/**
 * Load and run a playbook file, streaming JSONL events to `out`.
 * Resolves to the process exit code.
 */
export async function runPlaybookFile(file: string, options: RunFileOptions = {}): Promise<number> {
  const out = options.out ?? process.stdout;

  let config: EngineConfig;
  try {
    config = options.config ?? loadConfig(options.env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    out.write(JSON.stringify({ type: 'run_error', error: error.message, source: 'environment' }) + '\n');
    return 1;
  }

  const sinks: EventSink[] = [new StdoutSink(out)];

  const logDir = options.logDir ?? config.logDir;
  let logger: RunLogger | undefined;

  let playbook: Playbook;
  try {
    playbook = await loadPlaybook(file, { ...options.load, config, vars: options.vars, sinks });
  } catch (error) {
    if (!(error instanceof PlaybookLoadError)) throw error;
    out.write(JSON.stringify({ type: 'run_error', error: error.message, source: error.source }) + '\n');
    return 1;
  }

  if (logDir) {
    logger = new RunLogger(join(logDir, playbook.runId));
    sinks.push(logger);
  }

  const result = await playbook.run();

  if (logger) {
    await writeSummary({
      runDir: logger.getRunDir(),
      playbookName: playbook.name,
      run: result,
      totalTasks: playbook.tasks.length,
    });
  }

  return result.ok ? 0 : 1;
}

export function parseVar(entry: string, previous: Record<string, string>): Record<string, string> {
  const eq = entry.indexOf('=');
  if (eq <= 0) {
    throw new Error(`Invalid --var "${entry}": expected key=value`);
  }
  return { ...previous, [entry.slice(0, eq)]: entry.slice(eq + 1) };
}
