/**
 * Assertions over probe outcomes
 *
 * Every assertion is a pure function of the Outcome. Transport and decode
 * errors always fail: there is no "inconclusive" verdict.
 */

import { isRecord } from './codec.js';
import type { Assertion, Outcome, Verdict } from './types.js';

/**
 * Passes only on a decoded success response whose result satisfies `check`
 */
export function expectSuccess(check: (result: unknown) => Verdict): Assertion {
  return (outcome) => {
    if (outcome.kind !== 'decoded' || outcome.response.kind !== 'success') {
      return { passed: false, detail: `Expected a result response, got ${describeOutcome(outcome)}` };
    }
    const verdict = check(outcome.response.result);
    if (verdict.passed) {
      return verdict;
    }
    return {
      passed: false,
      detail: [verdict.detail, `Response: ${prettyJson(outcome.response.result)}`]
        .filter((part): part is string => part !== undefined)
        .join('\n'),
    };
  };
}

/**
 * Passes only on a decoded error response
 */
export function expectError(): Assertion {
  return (outcome) => {
    if (outcome.kind === 'decoded' && outcome.response.kind === 'failure') {
      return {
        passed: true,
        detail: `Error code: ${outcome.response.code}, message: ${outcome.response.message}`,
      };
    }
    return { passed: false, detail: `Expected an error response, got ${describeOutcome(outcome)}` };
  };
}

/**
 * The result must be an object carrying `field`
 */
export function hasField(field: string, describe: (value: unknown) => string): (result: unknown) => Verdict {
  return (result) => {
    if (!isRecord(result) || !(field in result)) {
      return { passed: false, detail: `Result has no '${field}' field` };
    }
    return { passed: true, detail: describe(result[field]) };
  };
}

/**
 * The result must carry a `tools` array of named entries covering `required`
 */
export function hasToolNames(required: readonly string[]): (result: unknown) => Verdict {
  return (result) => {
    if (!isRecord(result) || !Array.isArray(result.tools)) {
      return { passed: false, detail: "Result has no 'tools' list" };
    }

    const tools: unknown[] = result.tools;
    const names: string[] = [];
    for (const [index, tool] of tools.entries()) {
      if (!isRecord(tool) || typeof tool.name !== 'string') {
        return { passed: false, detail: `tools[${index}] has no name` };
      }
      names.push(tool.name);
    }

    const missing = required.filter((name) => !names.includes(name));
    if (missing.length > 0) {
      return { passed: false, detail: `Missing tools: ${missing.join(', ')}` };
    }
    return { passed: true, detail: `Found tools: ${names.join(', ')}` };
  };
}

/**
 * Human-readable rendering of an outcome for failure reports
 */
export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'decoded':
      return outcome.response.kind === 'success'
        ? `result: ${prettyJson(outcome.response.result)}`
        : `error: ${prettyJson({ code: outcome.response.code, message: outcome.response.message })}`;
    case 'transport-error':
      return withStderr(`transport error: ${outcome.reason}`, outcome.stderr);
    case 'decode-error':
      return withStderr(
        outcome.rawText === ''
          ? `decode error: ${outcome.reason}`
          : `decode error: ${outcome.reason}\nRaw: ${outcome.rawText}`,
        outcome.stderr
      );
  }
}

function withStderr(text: string, stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed === '' ? text : `${text}\nStderr: ${trimmed}`;
}

function prettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? String(value);
}
