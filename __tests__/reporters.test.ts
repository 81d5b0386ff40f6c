import { describe, it, expect } from 'vitest';
import { createColors, formatDuration, formatJUnitReport, formatJsonReport, formatTextReport } from '../src/reporters/index.js';
import type { RunResult } from '../src/types.js';

const plain = createColors(false);

const initialize = { name: 'Initialize', passed: true, detail: 'Protocol version: 2024-11-05', duration: 12 };

const mixed: RunResult = {
  target: '/opt/server',
  results: [
    initialize,
    {
      name: 'List Tools',
      passed: false,
      detail: 'Missing tools: list_chats, get_messages\nResponse: {}',
      duration: 8,
    },
  ],
  passed: 1,
  failed: 1,
  total: 2,
  duration: 20,
  timestamp: '2026-01-01T00:00:00.000Z',
};

describe('formatTextReport', () => {
  it('should print a status line per case in order with its detail', () => {
    const lines = formatTextReport(mixed, plain).split('\n');

    const first = lines.indexOf('  ✓ Initialize (12ms)');
    const second = lines.indexOf('  x List Tools (8ms)');
    expect(first).toBeGreaterThan(-1);
    expect(second).toBeGreaterThan(first);
    expect(lines[first + 1]).toBe('      Protocol version: 2024-11-05');
    expect(lines[second + 1]).toBe('      Missing tools: list_chats, get_messages');
    expect(lines[second + 2]).toBe('      Response: {}');
  });

  it('should print the numeric summary', () => {
    const lines = formatTextReport(mixed, plain).split('\n');

    expect(lines).toContain('Target: /opt/server');
    expect(lines).toContain('  1 passed');
    expect(lines).toContain('  1 failed');
    expect(lines).toContain('  2 total');
    expect(lines).toContain('1/2 tests passed');
    expect(lines).toContain('Some tests failed');
  });

  it('should celebrate a clean run', () => {
    const clean: RunResult = { ...mixed, results: [initialize], passed: 1, failed: 0, total: 1 };
    const lines = formatTextReport(clean, plain).split('\n');

    expect(lines).toContain('1/1 tests passed');
    expect(lines).toContain('All tests passed!');
    expect(lines).not.toContain('  0 failed');
  });

  it('should colorize when colors are enabled', () => {
    const output = formatTextReport(mixed, createColors(true));

    expect(output).toContain('\x1b[32m');
    expect(output).toContain('\x1b[31m');
  });
});

describe('formatJsonReport', () => {
  it('should round-trip the run result', () => {
    expect(JSON.parse(formatJsonReport(mixed))).toEqual(mixed);
  });
});

describe('formatJUnitReport', () => {
  it('should describe the run as one suite', () => {
    const lines = formatJUnitReport(mixed).split('\n');

    expect(lines[0]).toBe('<?xml version="1.0" encoding="UTF-8"?>');
    expect(lines[1]).toBe(
      '<testsuites name="Stdio Conformance" tests="2" failures="1" errors="0" time="0.020" timestamp="2026-01-01T00:00:00.000Z">'
    );
    expect(lines[2]).toBe(
      '  <testsuite name="/opt/server" tests="2" failures="1" errors="0" skipped="0" time="0.020">'
    );
    expect(lines).toContain('    <testcase name="Initialize" classname="Stdio.Conformance" time="0.012">');
    expect(lines).toContain('      <system-out>Protocol version: 2024-11-05</system-out>');
    expect(lines).toContain(
      '      <failure message="Missing tools: list_chats, get_messages" type="AssertionError">'
    );
    expect(lines[lines.length - 1]).toBe('</testsuites>');
  });

  it('should escape XML special characters', () => {
    const result: RunResult = {
      ...mixed,
      results: [{ name: 'A <b> & "c"', passed: false, detail: "it's <broken>", duration: 1 }],
      passed: 0,
      failed: 1,
      total: 1,
    };
    const lines = formatJUnitReport(result).split('\n');

    expect(lines).toContain('    <testcase name="A &lt;b&gt; &amp; &quot;c&quot;" classname="Stdio.Conformance" time="0.001">');
    expect(lines).toContain('      <failure message="it&apos;s &lt;broken&gt;" type="AssertionError">');
  });
});

describe('formatDuration', () => {
  it('should pick a readable unit', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(61000)).toBe('1m 1.0s');
  });
});
