import { describe, it, expect } from 'vitest';
import { Playbook } from '../../src/runner/playbook.js';
import { Task } from '../../src/runner/task.js';
import { Never } from '../../src/conditions/index.js';
import { ModuleError } from '../../src/exception/errors.js';
import { MemorySink } from '../../src/logging/sinks.js';
import { CommandModule } from '../../src/modules/builtins/command.module.js';
import { NullModule } from '../../src/modules/builtins/null.module.js';
import { interpolate, literal, resolve, state, variable } from '../../src/playbook/lazy.js';
import type { ProcessRunner } from '../../src/process/run-process.js';
import type { EventSink } from '../../src/types/index.js';
import { mockModule, okModule } from './helpers.js';

function failingModule(changed = false) {
  return mockModule('failing', () => Promise.reject(new ModuleError('it broke', changed)));
}

describe('Playbook', () => {
  it('runs every task in order and completes', async () => {
    const order: string[] = [];
    const tasks = ['a', 'b', 'c'].map(
      (name) =>
        new Task(
          name,
          mockModule(name, async () => {
            order.push(name);
            return { changed: false };
          }),
        ),
    );
    const playbook = new Playbook({ tasks });

    const run = await playbook.run();

    expect(order).toEqual(['a', 'b', 'c']);
    expect(run.ok).toBe(true);
    expect(run.status).toBe('completed');
    expect(run.results).toHaveLength(3);
    expect(run.haltedAt).toBeUndefined();
    expect(playbook.status).toBe('completed');
  });

  it('halts on the first failure and keeps earlier state', async () => {
    const third = okModule({ never: 'stored' });
    const playbook = new Playbook({
      tasks: [
        new Task('first', okModule({ id: 'one' })),
        new Task('second', failingModule(true)),
        new Task('third', third),
      ],
    });

    const run = await playbook.run();

    expect(run.ok).toBe(false);
    expect(run.status).toBe('halted');
    expect(run.haltedAt).toBe('second');
    expect(run.results.map((r) => r.description)).toEqual(['first', 'second']);
    expect(run.results[1]).toMatchObject({ succeeded: false, changed: true, error: 'it broke' });
    expect(third.apply).not.toHaveBeenCalled();
    expect([...playbook.context.state.entries()]).toEqual([['first', { id: 'one' }]]);
  });

  it('stores output under the task description', async () => {
    const playbook = new Playbook({ tasks: [new Task('lookup ip', okModule({ ip: '10.0.0.1' }))] });

    await playbook.run();

    expect(playbook.context.state.get('lookup ip')).toEqual({ ip: '10.0.0.1' });
  });

  it('lets a later task with the same description replace the stored output', async () => {
    const playbook = new Playbook({
      tasks: [new Task('same', okModule({ v: 1 })), new Task('same', okModule({ v: 2 }))],
    });

    await playbook.run();

    expect(playbook.context.state.size).toBe(1);
    expect(playbook.context.state.get('same')).toEqual({ v: 2 });
  });

  it('leaves state untouched for skipped tasks', async () => {
    const playbook = new Playbook({ tasks: [new Task('skipped', okModule({ v: 1 }), new Never())] });

    const run = await playbook.run();

    expect(run.results[0]).toMatchObject({ succeeded: true, changed: false, skipped: true });
    expect(playbook.context.state.size).toBe(0);
  });

  it('stores null output from the null module', async () => {
    const playbook = new Playbook({ tasks: [new Task('noop', new NullModule())] });

    await playbook.run();

    expect(playbook.context.state.has('noop')).toBe(true);
    expect(playbook.context.state.get('noop')).toBeNull();
  });

  it('stores a copy of the output', async () => {
    const output = { items: ['a'] };
    const playbook = new Playbook({ tasks: [new Task('t', okModule(output))] });

    await playbook.run();
    output.items.push('b');

    expect(playbook.context.state.get('t')).toEqual({ items: ['a'] });
  });

  it('makes earlier output visible to later tasks', async () => {
    const seen: string[] = [];
    const playbook = new Playbook({
      vars: { env: 'prod' },
      tasks: [
        new Task('deploy', okModule({ outputs: { Host: 'web.internal' } })),
        new Task(
          'announce',
          mockModule('reader', async (context) => {
            seen.push(resolve(interpolate('{}@{}', state('deploy', 'outputs.Host'), variable('env')), context));
            return { changed: false };
          }),
        ),
      ],
    });

    await playbook.run();

    expect(seen).toEqual(['web.internal@prod']);
  });

  it('resolves command arguments at execution time', async () => {
    const calls: [string, readonly string[]][] = [];
    const runner: ProcessRunner = async (command, args) => {
      calls.push([command, args]);
      return { exitCode: 0, stdout: Buffer.from(''), stderr: Buffer.from('') };
    };
    const module = new CommandModule({
      command: literal('/bin/echo'),
      args: [interpolate('hello-{}', variable('name'))],
      runner,
    });
    const playbook = new Playbook({ vars: { name: 'x' }, tasks: [new Task('greet', module)] });

    expect(calls).toEqual([]);
    await playbook.run();

    expect(calls).toEqual([['/bin/echo', ['hello-x']]]);
  });

  it('emits one task_end record per attempted task', async () => {
    const sink = new MemorySink();
    const playbook = new Playbook({
      runId: 'run-test',
      sinks: [sink],
      tasks: [
        new Task('ok', okModule({ n: 1 })),
        new Task('skip', okModule(), new Never()),
        new Task('bad', failingModule()),
        new Task('unreached', okModule()),
      ],
    });

    await playbook.run();

    expect(sink.ofType('task_end').map((e) => e.result)).toEqual([
      { module: 'mock', succeeded: true, changed: true, output: { n: 1 } },
      { module: 'mock', succeeded: true, changed: false },
      { module: 'failing', succeeded: false, changed: false, error: 'it broke' },
    ]);
    expect(sink.events.map((e) => e.type)).toEqual([
      'run_start',
      'task_start',
      'task_end',
      'task_start',
      'task_end',
      'task_start',
      'task_end',
      'run_complete',
    ]);
    expect(sink.ofType('run_complete')[0]).toMatchObject({
      runId: 'run-test',
      ok: false,
      status: 'halted',
      haltedAt: 'bad',
    });
  });

  it('keeps running when a sink fails', async () => {
    const broken: EventSink = {
      emit: () => {
        throw new Error('disk full');
      },
    };
    const playbook = new Playbook({ sinks: [broken], tasks: [new Task('a', okModule({ v: 1 }))] });

    const run = await playbook.run();

    expect(run.ok).toBe(true);
    expect(run.results[0].error).toBeUndefined();
    expect(run.warnings).toEqual([
      'emit run_start failed: disk full',
      'emit task_start failed: disk full',
      'emit task_end failed: disk full',
      'emit run_complete failed: disk full',
    ]);
  });

  it('does not store or emit output that is not a value', async () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const sink = new MemorySink();
    const playbook = new Playbook({ sinks: [sink], tasks: [new Task('loop', okModule(circular))] });

    const run = await playbook.run();

    expect(run.ok).toBe(true);
    expect(playbook.context.state.has('loop')).toBe(false);
    expect(sink.ofType('task_end')[0].result).toEqual({ module: 'mock', succeeded: true, changed: true });
    expect(run.warnings).toHaveLength(1);
    expect(run.warnings[0]).toMatch(/^output of "loop" is not a value: /);
  });

  it('keeps running when output is nested too deeply to convert', async () => {
    let deep: unknown[] = ['leaf'];
    for (let i = 0; i < 3000; i++) deep = [deep];
    const sink = new MemorySink();
    const playbook = new Playbook({
      sinks: [sink],
      tasks: [new Task('deep', okModule(deep)), new Task('after', okModule('done'))],
    });

    const run = await playbook.run();

    expect(run.ok).toBe(true);
    expect(run.status).toBe('completed');
    expect(run.results.map((r) => r.description)).toEqual(['deep', 'after']);
    expect(playbook.context.state.has('deep')).toBe(false);
    expect(playbook.context.state.get('after')).toBe('done');
    expect(run.warnings).toHaveLength(1);
    expect(run.warnings[0]).toMatch(/^output of "deep" is not a value: /);
    expect(sink.ofType('run_complete')).toHaveLength(1);
  });

  it('runs only once', async () => {
    const playbook = new Playbook({ name: 'once', tasks: [new Task('a', okModule())] });
    await playbook.run();

    await expect(playbook.run()).rejects.toThrow('Playbook "once" has already run (status: completed)');
  });

  it('starts pending with frozen vars and empty state', () => {
    const vars = { a: '1' };
    const playbook = new Playbook({ vars, tasks: [] });
    vars.a = '2';

    expect(playbook.status).toBe('pending');
    expect(playbook.context.vars).toEqual({ a: '1' });
    expect(Object.isFrozen(playbook.context.vars)).toBe(true);
    expect(playbook.context.state.size).toBe(0);
  });
});
