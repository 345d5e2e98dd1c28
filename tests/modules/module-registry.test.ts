import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ModuleRegistry, defineModule } from '../../src/modules/module-registry.js';
import { createDefaultRegistry } from '../../src/modules/builtins/index.js';
import { NullModule } from '../../src/modules/builtins/null.module.js';
import { DEFAULT_CONFIG } from '../../src/config.js';

const buildContext = { baseDir: '.', config: DEFAULT_CONFIG };

const echoModule = defineModule({
  type: 'echo',
  description: 'Returns its message',
  schema: z.object({ type: z.literal('echo'), message: z.string() }),
  create: (options) => ({
    name: 'echo',
    apply: async () => ({ changed: false, output: { message: options.message } }),
    destroy: async () => ({ changed: false }),
  }),
});

describe('ModuleRegistry', () => {
  it('registers and builds custom modules', async () => {
    const registry = new ModuleRegistry();
    registry.register(echoModule);

    const spec = { type: 'echo', message: 'hi' };
    const module = await registry.build(spec, buildContext);

    expect(module.name).toBe('echo');
    await expect(module.apply({ vars: {}, state: new Map() })).resolves.toEqual({
      changed: false,
      output: { message: 'hi' },
    });
  });

  it('throws on duplicate registration', () => {
    const registry = new ModuleRegistry();
    registry.register(echoModule);
    expect(() => registry.register(echoModule)).toThrow('Module "echo" is already registered');
  });

  it('validates options before creating', async () => {
    const registry = new ModuleRegistry();
    registry.register(echoModule);
    await expect(registry.build({ type: 'echo' }, buildContext)).rejects.toThrow();
  });

  it('ships null, command and cloudformation by default', async () => {
    const registry = createDefaultRegistry();

    expect(registry.list().map((m) => m.type)).toEqual(['null', 'command', 'cloudformation']);
    expect(registry.has('command')).toBe(true);
    expect(registry.get('ansible')).toBeUndefined();
    await expect(registry.build({ type: 'null' }, buildContext)).resolves.toBeInstanceOf(NullModule);
  });
});
