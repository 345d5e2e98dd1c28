import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { EventSink, RunEvent } from '../types/index.js';

/** Appends every run event, timestamped, to `<runDir>/logs.jsonl`. */
export class RunLogger implements EventSink {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async emit(event: RunEvent): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...event,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  getLogPath(): string {
    return this.logPath;
  }

  getRunDir(): string {
    return this.runDir;
  }
}
