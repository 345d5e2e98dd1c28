import type { EventSink, RunEvent } from '../types/index.js';

type Writable = { write(chunk: string): unknown };

/** One JSON object per line, the stream the CLI prints. */
export class StdoutSink implements EventSink {
  constructor(private out: Writable = process.stdout) {}

  emit(event: RunEvent): void {
    this.out.write(JSON.stringify(event) + '\n');
  }
}

export class MemorySink implements EventSink {
  readonly events: RunEvent[] = [];

  emit(event: RunEvent): void {
    this.events.push(event);
  }

  ofType<T extends RunEvent['type']>(type: T): Extract<RunEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<RunEvent, { type: T }> => e.type === type);
  }
}
