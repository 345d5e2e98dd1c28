import type { Module, ModuleResponse } from '../../types/index.js';

/** Does nothing. Useful as a placeholder task and in tests. */
export class NullModule implements Module {
  readonly name = 'null';

  async apply(): Promise<ModuleResponse> {
    return { changed: false, output: null };
  }

  async destroy(): Promise<ModuleResponse> {
    return { changed: false, output: null };
  }
}
