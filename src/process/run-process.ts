import { spawn } from 'node:child_process';

export interface ProcessResult {
  /** Exit code, or -1 when the process was ended by a signal. */
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

export type ProcessRunner = (command: string, args: readonly string[]) => Promise<ProcessResult>;

/**
 * Spawn a process with no stdin and captured stdout/stderr, and wait for
 * it to exit. Rejects only when the process cannot be started or its
 * streams fail.
 */
export const runProcess: ProcessRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
      });
    });
  });

const decoder = new TextDecoder('utf-8', { fatal: true });

/** Strict UTF-8 decode. Throws a TypeError on invalid input. */
export function decodeUtf8(buffer: Buffer): string {
  return decoder.decode(buffer);
}

/** Split into lines without a trailing empty line; `\r\n` counts as one break. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
