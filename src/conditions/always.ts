import type { Condition } from '../types/index.js';

export class Always implements Condition {
  readonly name = 'always';

  async evaluate(): Promise<boolean> {
    return true;
  }
}

export class Never implements Condition {
  readonly name = 'never';

  async evaluate(): Promise<boolean> {
    return false;
  }
}
