import { Always } from '../conditions/always.js';
import { Playbook } from '../runner/playbook.js';
import { Task } from '../runner/task.js';
import type { Condition, EventSink, Module } from '../types/index.js';

/**
 * Fluent construction of a playbook in code:
 *
 *   playbook('deploy')
 *     .vars({ env: 'staging' })
 *     .task('list files', new CommandModule({ command: literal('ls') }))
 *     .build();
 */
export class PlaybookBuilder {
  private _vars: Record<string, string> = {};
  private tasks: Task[] = [];
  private sinks: EventSink[] = [];

  constructor(private name?: string) {}

  vars(vars: Record<string, string>): this {
    this._vars = { ...this._vars, ...vars };
    return this;
  }

  task(description: string, module: Module, when: Condition = new Always()): this {
    this.tasks.push(new Task(description, module, when));
    return this;
  }

  sink(sink: EventSink): this {
    this.sinks.push(sink);
    return this;
  }

  build(): Playbook {
    return new Playbook({ name: this.name, tasks: this.tasks, vars: this._vars, sinks: this.sinks });
  }
}

export function playbook(name?: string): PlaybookBuilder {
  return new PlaybookBuilder(name);
}
