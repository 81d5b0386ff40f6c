/**
 * Text reporter for console output
 */

import pc from 'picocolors';
import type { CaseResult, RunResult } from '../types.js';

/**
 * The color functions a report is rendered with
 */
export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Build a color capability; disabled colors render plain text
 */
export function createColors(enabled: boolean): Colors {
  return pc.createColors(enabled);
}

/**
 * Format results as a per-case status list followed by a summary
 */
export function formatTextReport(result: RunResult, colors: Colors = pc): string {
  const c = colors;
  const lines: string[] = [];

  lines.push('');
  lines.push(c.bold('Stdio Conformance Results'));
  lines.push(c.dim(`Target: ${result.target}`));
  lines.push(c.dim(`Timestamp: ${result.timestamp}`));
  lines.push('');

  for (const test of result.results) {
    lines.push(...formatCase(test, c));
  }

  // Summary
  lines.push('');
  lines.push(c.bold('Summary'));
  lines.push(c.dim('─'.repeat(50)));

  if (result.passed > 0) {
    lines.push(c.green(`  ${result.passed} passed`));
  }
  if (result.failed > 0) {
    lines.push(c.red(`  ${result.failed} failed`));
  }
  lines.push(c.dim(`  ${result.total} total`));
  lines.push(c.dim(`  ${formatDuration(result.duration)}`));
  lines.push('');

  lines.push(c.yellow(`${result.passed}/${result.total} tests passed`));
  if (result.failed === 0) {
    lines.push(c.green(c.bold('All tests passed!')));
  } else {
    lines.push(c.red(c.bold('Some tests failed')));
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Status line plus indented detail for one case
 */
function formatCase(test: CaseResult, c: Colors): string[] {
  const icon = test.passed ? c.green('  ✓') : c.red('  x');
  const lines = [`${icon} ${test.name} ${c.dim(`(${formatDuration(test.duration)})`)}`];

  if (test.detail) {
    const paint = test.passed ? c.dim : c.red;
    for (const line of test.detail.split('\n')) {
      lines.push(paint(`      ${line}`));
    }
  }

  return lines;
}

/**
 * Format a duration in ms to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
