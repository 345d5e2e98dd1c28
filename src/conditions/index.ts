export { Always, Never } from './always.js';
export { ExecuteCondition, whenExecute } from './execute.js';
