/**
 * Single-exchange stdio transport
 *
 * Every call owns exactly one child process: it is spawned, fed one line,
 * has its stdin closed and is reaped before the returned promise settles.
 * No process is ever reused, so nothing one probe does can leak into the next.
 *
 * On POSIX the target leads its own process group, and a timeout kills the
 * whole group: helpers a wrapper script started die with it.
 */

import { spawn, type ChildProcess, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { ExchangeOptions, RawOutput, TargetCommand } from './types.js';
import { describeError } from './errors.js';

const GROUP_KILL = process.platform !== 'win32';

/**
 * Spawn `target`, write `line` followed by a newline, close stdin and collect
 * stdout/stderr until the process exits or `timeoutMs` elapses.
 *
 * Never rejects: spawn failures and timeouts are reported through `status`.
 */
export function exchange(
  target: TargetCommand,
  line: string,
  options: ExchangeOptions
): Promise<RawOutput> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let timedOut = false;

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(target.command, target.args ?? [], {
        cwd: target.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: GROUP_KILL,
      });
    } catch (error) {
      // Invalid arguments throw synchronously instead of emitting 'error'.
      resolve({ status: 'spawn-failed', stdout, stderr, error: describeError(error) });
      return;
    }

    const finish = (output: RawOutput) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve(output);
    };

    const timer = setTimeout(() => {
      timedOut = true;
      const exited = child.exitCode !== null || child.signalCode !== null;
      killTree(child);
      if (exited) {
        // No 'exit' will follow; a leftover descendant holds the pipes.
        finish({ status: 'timed-out', stdout, stderr, timeoutMs: options.timeoutMs, exited: true });
      }
    }, options.timeoutMs);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    // A target that exits without reading its input breaks the pipe; the
    // exchange outcome is still decided by what it printed.
    child.stdin.on('error', (error) => {
      stderr += `[stdin] ${error.message}\n`;
    });

    child.on('error', (error) => {
      if (child.pid === undefined) {
        finish({ status: 'spawn-failed', stdout, stderr, error: describeError(error) });
        return;
      }
      // A running child only errors when signalling it fails
      stderr += `[process] ${describeError(error)}\n`;
    });

    // After a kill, 'exit' proves the process is reaped; waiting for 'close'
    // as well could hang on pipes inherited by grandchildren.
    child.once('exit', () => {
      if (timedOut) {
        finish({ status: 'timed-out', stdout, stderr, timeoutMs: options.timeoutMs, exited: false });
      }
    });

    child.once('close', (code, signal) => {
      if (timedOut) {
        finish({ status: 'timed-out', stdout, stderr, timeoutMs: options.timeoutMs, exited: false });
        return;
      }
      finish({ status: 'completed', stdout, stderr, exitCode: code, signal });
    });

    if (child.pid !== undefined) {
      child.stdin.end(`${line}\n`);
    }
  });
}

/**
 * SIGKILL the target and, on POSIX, every process left in its group
 */
function killTree(child: ChildProcess): void {
  if (!GROUP_KILL || child.pid === undefined) {
    child.kill('SIGKILL');
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    // ESRCH: the group is already empty
    child.kill('SIGKILL');
  }
}
