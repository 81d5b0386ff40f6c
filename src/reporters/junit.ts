/**
 * JUnit XML reporter for CI integration
 */

import type { CaseResult, RunResult } from '../types.js';

const SUITE_NAME = 'Stdio Conformance';

/**
 * Format results as JUnit XML
 */
export function formatJUnitReport(result: RunResult): string {
  const lines: string[] = [];
  const time = (result.duration / 1000).toFixed(3);

  lines.push('<?xml version="1.0" encoding="UTF-8"?>');
  lines.push(
    `<testsuites name="${SUITE_NAME}" tests="${result.total}" failures="${result.failed}" errors="0" time="${time}" timestamp="${result.timestamp}">`
  );
  lines.push(
    `  <testsuite name="${escapeXml(result.target)}" tests="${result.total}" failures="${result.failed}" errors="0" skipped="0" time="${time}">`
  );

  for (const test of result.results) {
    lines.push(...formatTestCase(test));
  }

  lines.push('  </testsuite>');
  lines.push('</testsuites>');

  return lines.join('\n');
}

function formatTestCase(test: CaseResult): string[] {
  const lines: string[] = [];
  const time = (test.duration / 1000).toFixed(3);

  lines.push(
    `    <testcase name="${escapeXml(test.name)}" classname="${escapeXml(SUITE_NAME.replace(/\s+/g, '.'))}" time="${time}">`
  );

  if (!test.passed) {
    const detail = test.detail ?? 'Test failed';
    const message = detail.split('\n')[0] ?? detail;
    lines.push(`      <failure message="${escapeXml(message)}" type="AssertionError">`);
    lines.push(escapeXml(detail));
    lines.push('      </failure>');
  } else if (test.detail) {
    lines.push(`      <system-out>${escapeXml(test.detail)}</system-out>`);
  }

  lines.push('    </testcase>');

  return lines;
}

/**
 * Escape special characters for XML
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
