import { readFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import {
  CloudFormationModuleSchema,
  CommandModuleSchema,
  NullModuleSchema,
} from '../../schemas/playbook.schema.js';
import { literal } from '../../playbook/lazy.js';
import { AwsStackApi } from '../aws/aws-stack-api.js';
import { CloudFormationModule, type LazyTemplate } from '../aws/cloudformation.module.js';
import { ModuleRegistry, defineModule } from '../module-registry.js';
import { CommandModule } from './command.module.js';
import { NullModule } from './null.module.js';

export const nullModule = defineModule({
  type: 'null',
  description: 'Does nothing',
  schema: NullModuleSchema,
  create: () => new NullModule(),
});

export const commandModule = defineModule({
  type: 'command',
  description: 'Runs a local process',
  schema: CommandModuleSchema,
  create: (options, context) =>
    new CommandModule({
      command: options.command,
      args: options.args,
      creates: options.creates,
      removes: options.removes,
      runner: context.runner,
    }),
});

export const cloudFormationModule = defineModule({
  type: 'cloudformation',
  description: 'Creates or updates a CloudFormation stack',
  schema: CloudFormationModuleSchema,
  create: async (options, context) => {
    let template: LazyTemplate;
    if ('file' in options.template) {
      const body = await readFile(resolvePath(context.baseDir, options.template.file), 'utf-8');
      template = { kind: 'body', body: literal(body) };
    } else if ('body' in options.template) {
      template = { kind: 'body', body: options.template.body };
    } else {
      template = { kind: 'url', url: options.template.url };
    }

    return new CloudFormationModule({
      stackName: options.stackName,
      template,
      api: context.stackApi ?? new AwsStackApi({ region: context.config.region }),
      poll: { intervalMs: context.config.pollIntervalMs, maxAttempts: context.config.maxPollAttempts },
    });
  },
});

export function createDefaultRegistry(): ModuleRegistry {
  const registry = new ModuleRegistry();
  registry.register(nullModule);
  registry.register(commandModule);
  registry.register(cloudFormationModule);
  return registry;
}

export { CommandModule, NullModule };
export type { CommandModuleOptions, CommandOutput } from './command.module.js';
