import { describe, it, expect } from 'vitest';
import { playbook } from '../../src/playbook/builder.js';
import { Always, Never } from '../../src/conditions/index.js';
import { NullModule } from '../../src/modules/builtins/null.module.js';
import { MemorySink } from '../../src/logging/sinks.js';

describe('PlaybookBuilder', () => {
  it('builds a playbook with vars, tasks and sinks', async () => {
    const sink = new MemorySink();
    const built = playbook('demo')
      .vars({ a: '1' })
      .vars({ b: '2' })
      .task('first', new NullModule())
      .task('second', new NullModule(), new Never())
      .sink(sink)
      .build();

    expect(built.name).toBe('demo');
    expect(built.context.vars).toEqual({ a: '1', b: '2' });
    expect(built.tasks.map((t) => t.description)).toEqual(['first', 'second']);
    expect(built.tasks[0].condition).toBeInstanceOf(Always);
    expect(built.tasks[1].condition).toBeInstanceOf(Never);

    const run = await built.run();

    expect(run.ok).toBe(true);
    expect(sink.ofType('task_end')).toHaveLength(2);
    expect([...built.context.state.keys()]).toEqual(['first']);
  });

  it('gives each build its own context', async () => {
    const builder = playbook().task('noop', new NullModule());
    const one = builder.build();
    const two = builder.build();

    await one.run();

    expect(one.context.state.size).toBe(1);
    expect(two.context.state.size).toBe(0);
    expect(two.status).toBe('pending');
  });
});
