import { access } from 'node:fs/promises';
import { ModuleError, errorMessage } from '../../exception/errors.js';
import { decodeUtf8, runProcess, splitLines, type ProcessResult, type ProcessRunner } from '../../process/run-process.js';
import { resolve, resolveAll, type LazyString } from '../../playbook/lazy.js';
import type { Module, ModuleResponse, TaskContext } from '../../types/index.js';

export interface CommandOutput {
  exit_status: number;
  stdout: string;
  stderr: string;
  stdout_lines: string[];
  stderr_lines: string[];
}

export interface CommandModuleOptions {
  command: LazyString;
  args?: LazyString[];
  /** Skip when this path already exists. */
  creates?: LazyString;
  /** Skip when this path does not exist. */
  removes?: LazyString;
  runner?: ProcessRunner;
}

export class CommandModule implements Module {
  readonly name = 'command';

  readonly command: LazyString;
  readonly args: readonly LazyString[];
  readonly creates?: LazyString;
  readonly removes?: LazyString;
  private runner: ProcessRunner;

  constructor(options: CommandModuleOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.creates = options.creates;
    this.removes = options.removes;
    this.runner = options.runner ?? runProcess;
  }

  async apply(context: TaskContext): Promise<ModuleResponse> {
    const command = resolve(this.command, context);
    const args = resolveAll(this.args, context);

    const creates = this.creates ? resolve(this.creates, context) : '';
    if (creates !== '' && (await pathExists(creates))) {
      return { changed: false };
    }
    const removes = this.removes ? resolve(this.removes, context) : '';
    if (removes !== '' && !(await pathExists(removes))) {
      return { changed: false };
    }

    let result: ProcessResult;
    try {
      result = await this.runner(command, args);
    } catch (error) {
      throw new ModuleError(errorMessage(error), true);
    }

    let stdout: string;
    let stderr: string;
    try {
      stdout = decodeUtf8(result.stdout);
      stderr = decodeUtf8(result.stderr);
    } catch (error) {
      throw new ModuleError(`invalid utf-8 in output of ${command}: ${errorMessage(error)}`, true);
    }

    if (result.exitCode !== 0) {
      throw new ModuleError(stderr !== '' ? stderr : `command exited with status ${result.exitCode}`, true);
    }

    const output: CommandOutput = {
      exit_status: result.exitCode,
      stdout,
      stderr,
      stdout_lines: splitLines(stdout),
      stderr_lines: splitLines(stderr),
    };
    return { changed: true, output };
  }

  async destroy(): Promise<ModuleResponse> {
    return { changed: false };
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
