export type * from './types/index.js';
export * from './exception/errors.js';
export { lookup, type LookupResult } from './state/lookup.js';
export { isScalar, toValue, type ValueConversion } from './state/value.js';
export {
  describeLazy,
  interpolate,
  literal,
  resolve,
  resolveAll,
  state,
  variable,
  withDefault,
  type LazyString,
} from './playbook/lazy.js';
export { Always, Never, ExecuteCondition, whenExecute } from './conditions/index.js';
export { Task } from './runner/task.js';
export { Playbook, type PlaybookOptions, type PlaybookRunResult } from './runner/playbook.js';
export { createContext } from './runner/context.js';
export { PlaybookBuilder, playbook } from './playbook/builder.js';
export { loadPlaybook, parsePlaybook, type LoadOptions } from './playbook/loader.js';
export { ModuleRegistry, defineModule, type ModuleDefinition, type RegisteredModule } from './modules/module-registry.js';
export { createDefaultRegistry, CommandModule, NullModule } from './modules/builtins/index.js';
export { CloudFormationModule } from './modules/aws/cloudformation.module.js';
export { AwsStackApi } from './modules/aws/aws-stack-api.js';
export type { StackApi, StackDescription, StackRequest } from './modules/aws/stack-api.js';
export { waitForStack, classifyStatus } from './modules/aws/stack-poller.js';
export { runProcess, type ProcessRunner, type ProcessResult } from './process/run-process.js';
export { RunLogger } from './logging/run-logger.js';
export { MemorySink, StdoutSink } from './logging/sinks.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';
export { loadConfig, DEFAULT_CONFIG, type EngineConfig } from './config.js';
