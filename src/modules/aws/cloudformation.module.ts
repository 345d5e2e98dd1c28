import { ModuleError, errorMessage } from '../../exception/errors.js';
import { resolve, type LazyString } from '../../playbook/lazy.js';
import type { Module, ModuleResponse, TaskContext } from '../../types/index.js';
import type { StackApi, StackDescription, StackRequest, StackTemplate, UpdateOutcome } from './stack-api.js';
import { CREATE_TRANSITION, UPDATE_TRANSITION, waitForStack, type PollOptions } from './stack-poller.js';

export const STACK_CAPABILITIES = ['CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM', 'CAPABILITY_AUTO_EXPAND'] as const;

export type LazyTemplate = { kind: 'body'; body: LazyString } | { kind: 'url'; url: LazyString };

export interface StackOutputs {
  outputs: Record<string, string>;
}

export interface CloudFormationModuleOptions {
  stackName: LazyString;
  template: LazyTemplate;
  api: StackApi;
  poll: PollOptions;
}

/** Create the stack if it is missing, update it otherwise, and wait for it to settle. */
export class CloudFormationModule implements Module {
  readonly name = 'cloudformation';

  readonly stackName: LazyString;
  readonly template: LazyTemplate;
  private api: StackApi;
  private poll: PollOptions;

  constructor(options: CloudFormationModuleOptions) {
    this.stackName = options.stackName;
    this.template = options.template;
    this.api = options.api;
    this.poll = options.poll;
  }

  async apply(context: TaskContext): Promise<ModuleResponse> {
    const request: StackRequest = {
      stackName: resolve(this.stackName, context),
      template: this.resolveTemplate(context),
      capabilities: STACK_CAPABILITIES,
    };

    let existing: StackDescription | undefined;
    try {
      existing = await this.api.describeStack(request.stackName);
    } catch (error) {
      throw new ModuleError(errorMessage(error), false);
    }

    if (!existing) {
      return this.create(request);
    }
    return this.update(request);
  }

  async destroy(): Promise<ModuleResponse> {
    return { changed: false };
  }

  private async create(request: StackRequest): Promise<ModuleResponse> {
    try {
      await this.api.createStack(request);
      const stack = await waitForStack(this.api, request.stackName, CREATE_TRANSITION, this.poll);
      return { changed: true, output: toOutput(stack) };
    } catch (error) {
      throw new ModuleError(errorMessage(error), true);
    }
  }

  private async update(request: StackRequest): Promise<ModuleResponse> {
    let outcome: UpdateOutcome;
    try {
      outcome = await this.api.updateStack(request);
    } catch (error) {
      throw new ModuleError(errorMessage(error), true);
    }

    if (outcome === 'no_updates') {
      try {
        const current = await this.api.describeStack(request.stackName);
        return { changed: false, output: current ? toOutput(current) : undefined };
      } catch (error) {
        throw new ModuleError(errorMessage(error), false);
      }
    }

    try {
      const stack = await waitForStack(this.api, request.stackName, UPDATE_TRANSITION, this.poll);
      return { changed: true, output: toOutput(stack) };
    } catch (error) {
      throw new ModuleError(errorMessage(error), true);
    }
  }

  private resolveTemplate(context: TaskContext): StackTemplate {
    return this.template.kind === 'body'
      ? { kind: 'body', body: resolve(this.template.body, context) }
      : { kind: 'url', url: resolve(this.template.url, context) };
  }
}

function toOutput(stack: StackDescription): StackOutputs | undefined {
  return stack.outputs ? { outputs: stack.outputs } : undefined;
}
