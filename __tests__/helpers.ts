/**
 * Shared helpers for launching the stand-in server
 */

import { fileURLToPath } from 'url';
import type { TargetCommand } from '../src/types.js';

export const FIXTURE_SERVER = fileURLToPath(new URL('./fixtures/stdio-server.mjs', import.meta.url));

export type FixtureMode =
  | 'conformant'
  | 'partial'
  | 'blank-first'
  | 'exit-nonzero'
  | 'silent'
  | 'garbage'
  | 'hang'
  | 'stderr';

/**
 * Target that runs the stand-in server in `mode` through the current node binary
 */
export function fixtureTarget(mode: FixtureMode): TargetCommand {
  return { command: process.execPath, args: [FIXTURE_SERVER, mode] };
}

/**
 * Target with a node one-liner, for transport-level checks
 */
export function nodeScript(source: string): TargetCommand {
  return { command: process.execPath, args: ['-e', source] };
}

/**
 * Node one-liner that answers and exits, leaving a child that holds its
 * stdout open for five seconds
 */
export const RESPONSE_THEN_LINGER =
  `process.stdout.write('{"jsonrpc":"2.0","id":1,"result":{}}\\n');` +
  ` require('child_process').spawn(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'],` +
  ` { stdio: ['ignore', 'inherit', 'ignore'] }).unref();`;

export const MISSING_EXECUTABLE = '/nonexistent/stdio-conformance/missing-server';
