import type { BatchReport } from '@audio-batch/core';

/**
 * Render a batch report for the terminal
 */
export function formatReport(report: BatchReport): string {
  const lines = [
    `Processed ${report.totalJobs} file(s) in ${(report.durationMs / 1000).toFixed(1)}s: ` +
      `${report.succeeded} succeeded, ${report.skipped} skipped, ${report.failed} failed`
  ];

  const skipped = report.outcomes.filter(outcome => outcome.status === 'skipped');
  if (skipped.length > 0) {
    lines.push('', 'Skipped:');
    for (const outcome of skipped) {
      lines.push(`  - ${outcome.sourcePath}: ${outcome.detail ?? 'skipped'}`);
    }
  }

  if (report.failed > 0) {
    lines.push('', `Finished with ${report.failed} error(s):`);
    for (const failure of report.failures) {
      lines.push(`  - ${failure.sourcePath}: ${failure.error}`);
    }
  } else {
    lines.push('', 'All files processed successfully!');
  }

  return lines.join('\n');
}

/**
 * Process exit code for a finished batch: non-zero when any job failed
 * or there was nothing to process
 */
export function exitCodeFor(report: BatchReport): number {
  return report.totalJobs > 0 && report.failed === 0 ? 0 : 1;
}
