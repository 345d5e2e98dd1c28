import {
  CloudFormationClient,
  CreateStackCommand,
  DescribeStacksCommand,
  UpdateStackCommand,
  type Capability,
  type DescribeStacksCommandOutput,
  type Output as StackOutput,
} from '@aws-sdk/client-cloudformation';
import { StackError, errorMessage } from '../../exception/errors.js';
import type { StackApi, StackDescription, StackRequest, UpdateOutcome } from './stack-api.js';

const NO_UPDATES = 'No updates are to be performed';

type CloudFormationSender = Pick<CloudFormationClient, 'send'>;

export interface AwsStackApiOptions {
  region?: string;
  client?: CloudFormationSender;
}

/** StackApi backed by the AWS CloudFormation service. */
export class AwsStackApi implements StackApi {
  private client: CloudFormationSender;

  constructor(options: AwsStackApiOptions = {}) {
    this.client = options.client ?? new CloudFormationClient(options.region ? { region: options.region } : {});
  }

  async describeStack(stackName: string): Promise<StackDescription | undefined> {
    let response: DescribeStacksCommandOutput;
    try {
      response = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
    } catch (error) {
      if (isStackMissing(error)) return undefined;
      throw new StackError(errorMessage(error), 'api', stackName);
    }

    const stack = response.Stacks?.[0];
    if (!stack) return undefined;

    return {
      stackName,
      status: stack.StackStatus ?? 'UNKNOWN',
      outputs: stack.Outputs ? outputsToMap(stack.Outputs) : undefined,
    };
  }

  async createStack(request: StackRequest): Promise<void> {
    try {
      await this.client.send(
        new CreateStackCommand({
          StackName: request.stackName,
          Capabilities: toCapabilities(request.capabilities),
          ...templateParams(request),
        }),
      );
    } catch (error) {
      throw new StackError(errorMessage(error), 'api', request.stackName);
    }
  }

  async updateStack(request: StackRequest): Promise<UpdateOutcome> {
    try {
      await this.client.send(
        new UpdateStackCommand({
          StackName: request.stackName,
          Capabilities: toCapabilities(request.capabilities),
          ...templateParams(request),
        }),
      );
      return 'updating';
    } catch (error) {
      if (errorMessage(error).includes(NO_UPDATES)) return 'no_updates';
      throw new StackError(errorMessage(error), 'api', request.stackName);
    }
  }
}

function isStackMissing(error: unknown): boolean {
  const message = errorMessage(error);
  return message.includes('Stack with id') && message.includes('does not exist');
}

function templateParams(request: StackRequest): { TemplateBody?: string; TemplateURL?: string } {
  return request.template.kind === 'body'
    ? { TemplateBody: request.template.body }
    : { TemplateURL: request.template.url };
}

function toCapabilities(capabilities: readonly string[]): Capability[] {
  return capabilities.filter(isCapability);
}

function isCapability(value: string): value is Capability {
  return value === 'CAPABILITY_IAM' || value === 'CAPABILITY_NAMED_IAM' || value === 'CAPABILITY_AUTO_EXPAND';
}

export function outputsToMap(outputs: readonly StackOutput[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (const output of outputs) {
    if (output.OutputKey !== undefined && output.OutputValue !== undefined) {
      map[output.OutputKey] = output.OutputValue;
    }
  }
  return map;
}
