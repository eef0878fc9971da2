import type { ExecutionSummary, WorkflowResult } from '../types/index.js';

const RULE = '='.repeat(50);

export function buildSubject(summary: Pick<ExecutionSummary, 'success'>, prefix: string): string {
  return summary.success ? `✓ ${prefix} - Success` : `✗ ${prefix} - Partial Failure`;
}

/**
 * Plain-text run report: one block per site, in run order.
 */
export function buildReportText(summary: ExecutionSummary): string {
  const lines: string[] = [
    `${summary.success ? '✓' : '✗'} PROFILE REFRESH SUMMARY`,
    RULE,
    '',
    `Start Time: ${new Date(summary.startedAt).toISOString()}`,
    `End Time: ${new Date(summary.endedAt).toISOString()}`,
    `Total Duration: ${formatSeconds(summary.totalDurationMs)}`,
    '',
    'SITE RESULTS:',
  ];

  for (const result of summary.results) {
    lines.push('');
    lines.push(...describeResult(result));
  }

  lines.push('');
  lines.push(RULE);
  lines.push('This is an automated notification.');
  return lines.join('\n') + '\n';
}

function describeResult(result: WorkflowResult): string[] {
  if (result.success) {
    return [`${result.site}: ✓ Success`, `  Duration: ${result.durationMs}ms`];
  }
  const kind = result.errorKind ? ` [${result.errorKind}]` : '';
  return [`${result.site}: ✗ Failed${kind}`, `  Error: ${result.error ?? 'Unknown'}`];
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
