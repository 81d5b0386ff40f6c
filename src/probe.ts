/**
 * One request, one process, one Outcome
 */

import { decodeResponse, encodeRequest } from './codec.js';
import { exchange } from './transport.js';
import type { ExchangeOptions, JsonRpcRequest, Outcome, RawOutput, TargetCommand } from './types.js';

/**
 * Send `request` to a freshly spawned `target` and classify what came back.
 * A single attempt: retrying would hide flaky targets.
 */
export function probe(
  target: TargetCommand,
  request: JsonRpcRequest,
  options: ExchangeOptions
): Promise<Outcome> {
  return probeLine(target, encodeRequest(request), options);
}

/**
 * Like {@link probe}, for a line that is already encoded (or deliberately broken)
 */
export async function probeLine(
  target: TargetCommand,
  line: string,
  options: ExchangeOptions
): Promise<Outcome> {
  const raw = await exchange(target, line, options);
  return classify(target, raw);
}

function classify(target: TargetCommand, raw: RawOutput): Outcome {
  switch (raw.status) {
    case 'spawn-failed':
      return {
        kind: 'transport-error',
        reason: `failed to start ${target.command}: ${raw.error}`,
        stderr: raw.stderr,
      };
    case 'timed-out':
      return {
        kind: 'transport-error',
        reason: raw.exited
          ? `exited but output pipes stayed open after ${raw.timeoutMs}ms`
          : `timed out after ${raw.timeoutMs}ms`,
        stderr: raw.stderr,
      };
    case 'completed': {
      // The exit code is deliberately ignored: a target that answers
      // correctly and then exits non-zero still answered correctly.
      const decoded = decodeResponse(raw.stdout);
      if (decoded.ok) {
        return { kind: 'decoded', response: decoded.response };
      }
      return {
        kind: 'decode-error',
        reason: decoded.reason,
        rawText: decoded.rawText,
        stderr: raw.stderr,
      };
    }
  }
}
