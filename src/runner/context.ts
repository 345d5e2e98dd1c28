import type { Context } from '../types/index.js';

export function createContext(vars: Record<string, string> = {}): Context {
  return {
    vars: Object.freeze({ ...vars }),
    state: new Map(),
  };
}
