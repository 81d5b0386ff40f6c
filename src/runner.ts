/**
 * Suite runner
 * Executes conformance cases one at a time against a target executable
 */

import { createRequest } from './codec.js';
import { describeError } from './errors.js';
import { probe, probeLine } from './probe.js';
import type { CaseResult, ConformanceCase, Outcome, RunResult, TargetCommand } from './types.js';

export interface SuiteOptions {
  /** Timeout for each probe in milliseconds */
  timeout: number;
  /** Called after each case, in execution order */
  onResult?: (result: CaseResult, index: number, total: number) => void;
}

/**
 * Run every case in declaration order.
 *
 * A case that throws still produces exactly one (failed) result, so the
 * returned `results` always has one entry per case.
 */
export async function runSuite(
  target: TargetCommand,
  cases: readonly ConformanceCase[],
  options: SuiteOptions
): Promise<RunResult> {
  const startTime = Date.now();
  const results: CaseResult[] = [];

  for (const [index, test] of cases.entries()) {
    const result = await runCase(target, test, options.timeout);
    results.push(result);
    options.onResult?.(result, index, cases.length);
  }

  const passed = results.filter((result) => result.passed).length;

  return {
    target: target.command,
    results,
    passed,
    failed: results.length - passed,
    total: results.length,
    duration: Date.now() - startTime,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Run a single case; never throws
 */
export async function runCase(
  target: TargetCommand,
  test: ConformanceCase,
  timeout: number
): Promise<CaseResult> {
  const startTime = Date.now();

  try {
    const outcome = await send(target, test, timeout);
    const verdict = test.assert(outcome);
    return {
      name: test.name,
      passed: verdict.passed,
      detail: verdict.detail,
      duration: Date.now() - startTime,
    };
  } catch (error) {
    return {
      name: test.name,
      passed: false,
      detail: `Unexpected error: ${describeError(error)}`,
      duration: Date.now() - startTime,
    };
  }
}

/**
 * 0 when every case passed, 1 otherwise
 */
export function exitCodeFor(result: RunResult): 0 | 1 {
  return result.passed === result.total ? 0 : 1;
}

function send(target: TargetCommand, test: ConformanceCase, timeout: number): Promise<Outcome> {
  const options = { timeoutMs: timeout };
  switch (test.input.kind) {
    case 'request':
      return probe(target, createRequest(test.input.template), options);
    case 'raw':
      return probeLine(target, test.input.line, options);
  }
}
