/**
 * Builds the target executable before any probe runs
 */

import { spawn } from 'node:child_process';
import { BuildError, describeError } from './errors.js';

export const DEFAULT_BUILD_COMMAND = 'cargo build --release --features mcp --bin chat-mcp-server';

export interface BuildResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Duration in milliseconds */
  duration: number;
}

/**
 * Run `command` through the shell and capture its output
 */
export function runBuild(command: string, options: { cwd: string }): Promise<BuildResult> {
  const startTime = Date.now();

  return new Promise((resolve) => {
    const proc = spawn(command, {
      cwd: options.cwd,
      env: process.env,
      shell: true,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ ok: code === 0, exitCode: code, stdout, stderr, duration: Date.now() - startTime });
    });

    proc.on('error', (err) => {
      resolve({
        ok: false,
        exitCode: null,
        stdout,
        stderr: describeError(err),
        duration: Date.now() - startTime,
      });
    });
  });
}

/**
 * Run the build and throw a {@link BuildError} unless it succeeded
 */
export async function ensureBuilt(command: string, options: { cwd: string }): Promise<BuildResult> {
  const result = await runBuild(command, options);
  if (!result.ok) {
    const status = result.exitCode === null ? 'could not be started' : `exited with code ${result.exitCode}`;
    throw new BuildError(`Build command ${status}: ${command}`, result.exitCode, result.stderr || result.stdout);
  }
  return result;
}
