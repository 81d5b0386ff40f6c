/**
 * Line-delimited JSON-RPC codec
 */

import type { JsonRpcRequest, JsonRpcResponse, RequestTemplate } from './types.js';

export type DecodeResult =
  | { ok: true; response: JsonRpcResponse }
  | { ok: false; reason: string; rawText: string };

/**
 * Build a fresh, frozen request from a case template
 */
export function createRequest(template: RequestTemplate): JsonRpcRequest {
  const request: JsonRpcRequest =
    template.params === undefined
      ? { jsonrpc: '2.0', id: template.id, method: template.method }
      : {
          jsonrpc: '2.0',
          id: template.id,
          method: template.method,
          params: Object.freeze({ ...template.params }),
        };

  return Object.freeze(request);
}

/**
 * Serialize a request to its single-line wire form (no trailing newline)
 */
export function encodeRequest(request: JsonRpcRequest): string {
  const { jsonrpc, id, method, params } = request;
  return JSON.stringify(params === undefined ? { jsonrpc, id, method } : { jsonrpc, id, method, params });
}

/**
 * Decode the first non-empty line of a target's stdout.
 *
 * Exactly one of success or failure is produced; a payload carrying both
 * `result` and `error`, or neither, is rejected rather than guessed at.
 */
export function decodeResponse(stdout: string): DecodeResult {
  const line = firstNonEmptyLine(stdout);
  if (line === undefined) {
    return { ok: false, reason: 'empty response', rawText: '' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { ok: false, reason: 'invalid response', rawText: line };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: 'response is not an object', rawText: line };
  }

  const hasResult = 'result' in parsed;
  const hasError = 'error' in parsed;

  if (hasResult && hasError) {
    return { ok: false, reason: 'response has both result and error', rawText: line };
  }

  if (hasResult) {
    return { ok: true, response: { kind: 'success', result: parsed.result } };
  }

  if (!hasError) {
    return { ok: false, reason: 'response has neither result nor error', rawText: line };
  }

  const error = parsed.error;
  if (
    !isRecord(error) ||
    typeof error.code !== 'number' ||
    !Number.isInteger(error.code) ||
    typeof error.message !== 'string'
  ) {
    return { ok: false, reason: 'malformed error object', rawText: line };
  }

  const code = error.code;
  const message = error.message;
  return {
    ok: true,
    response: 'data' in error
      ? { kind: 'failure', code, message, data: error.data }
      : { kind: 'failure', code, message },
  };
}

/**
 * Plain-object check shared by the codec and the assertions
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstNonEmptyLine(text: string): string | undefined {
  for (const raw of text.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line.trim() !== '') {
      return line;
    }
  }
  return undefined;
}
