import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PlaybookRunResult } from '../runner/playbook.js';

export interface SummaryOptions {
  runDir: string;
  playbookName: string;
  run: PlaybookRunResult;
  totalTasks: number;
}

export async function writeSummary(options: SummaryOptions): Promise<string> {
  const { runDir, playbookName, run, totalTasks } = options;
  const path = join(runDir, 'summary.md');
  await writeFile(path, buildSummaryMarkdown(playbookName, run, totalTasks), 'utf-8');
  return path;
}

export function buildSummaryMarkdown(playbookName: string, run: PlaybookRunResult, totalTasks: number): string {
  const succeeded = run.results.filter((r) => r.succeeded).length;
  const changed = run.results.filter((r) => r.changed).length;
  const skipped = run.results.filter((r) => r.skipped).length;

  const lines: string[] = [
    '# Run Summary',
    `- Playbook: ${playbookName}`,
    `- Result: ${run.ok ? 'Completed' : 'Halted'}`,
    `- Duration: ${formatDuration(run.durationMs)}`,
    `- Tasks: ${succeeded}/${totalTasks} succeeded (${changed} changed, ${skipped} skipped)`,
    '',
    '## Tasks',
  ];

  run.results.forEach((result, i) => {
    const mark = !result.succeeded ? 'FAILED' : result.skipped ? 'skipped' : result.changed ? 'changed' : 'ok';
    lines.push(`${i + 1}. ${result.description} [${result.module}]: ${mark}`);
    if (result.error) {
      lines.push(`   - ${result.error.trim()}`);
    }
  });

  const notRun = totalTasks - run.results.length;
  if (notRun > 0) {
    lines.push('');
    lines.push(`${notRun} task(s) not run after "${run.haltedAt}" failed.`);
  }

  if (run.warnings.length > 0) {
    lines.push('');
    lines.push('## Warnings');
    for (const warning of run.warnings) {
      lines.push(`- ${warning}`);
    }
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${run.runId}`);

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
