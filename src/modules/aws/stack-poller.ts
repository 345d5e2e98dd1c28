import { setTimeout as sleepFor } from 'node:timers/promises';
import { StackError } from '../../exception/errors.js';
import type { StackApi, StackDescription } from './stack-api.js';

export interface StackTransition {
  success: string;
  failures: readonly string[];
}

export const CREATE_TRANSITION: StackTransition = {
  success: 'CREATE_COMPLETE',
  failures: ['CREATE_FAILED', 'DELETE_COMPLETE', 'DELETE_FAILED', 'ROLLBACK_FAILED', 'ROLLBACK_COMPLETE'],
};

export const UPDATE_TRANSITION: StackTransition = {
  success: 'UPDATE_COMPLETE',
  failures: ['UPDATE_FAILED', 'UPDATE_ROLLBACK_FAILED', 'UPDATE_ROLLBACK_COMPLETE'],
};

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  sleep?: (ms: number) => Promise<unknown>;
}

export type PollState = 'done' | 'failed' | 'waiting' | 'unrecognized';

/** Classify a status against a transition. */
export function classifyStatus(status: string, transition: StackTransition): PollState {
  if (status === transition.success) return 'done';
  if (transition.failures.includes(status)) return 'failed';
  if (status.endsWith('_IN_PROGRESS')) return 'waiting';
  return 'unrecognized';
}

/**
 * Poll until the stack reaches the transition's success status.
 * Fails on a failure status, on a status that is neither terminal nor in
 * progress, and after `maxAttempts` polls.
 */
export async function waitForStack(
  api: StackApi,
  stackName: string,
  transition: StackTransition,
  options: PollOptions,
): Promise<StackDescription> {
  const sleep = options.sleep ?? sleepFor;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const stack = await api.describeStack(stackName);
    if (!stack) {
      throw new StackError(`stack ${stackName} disappeared while waiting`, 'not_found', stackName);
    }

    switch (classifyStatus(stack.status, transition)) {
      case 'done':
        return stack;
      case 'failed':
        throw new StackError(stack.status, 'failed_status', stackName);
      case 'unrecognized':
        throw new StackError(`unrecognized stack status ${stack.status}`, 'unrecognized_status', stackName);
      case 'waiting':
        if (attempt < options.maxAttempts) await sleep(options.intervalMs);
        break;
    }
  }

  throw new StackError(
    `stack ${stackName} did not reach ${transition.success} after ${options.maxAttempts} polls`,
    'timed_out',
    stackName,
  );
}
