export type StackTemplate = { kind: 'body'; body: string } | { kind: 'url'; url: string };

export interface StackRequest {
  stackName: string;
  template: StackTemplate;
  capabilities: readonly string[];
}

export interface StackDescription {
  stackName: string;
  status: string;
  /** Absent when the stack declares no outputs. */
  outputs?: Record<string, string>;
}

export type UpdateOutcome = 'updating' | 'no_updates';

/** Provisioning operations the cloudformation module depends on. */
export interface StackApi {
  /** Resolves `undefined` when the stack does not exist. */
  describeStack(stackName: string): Promise<StackDescription | undefined>;
  createStack(request: StackRequest): Promise<void>;
  updateStack(request: StackRequest): Promise<UpdateOutcome>;
}
