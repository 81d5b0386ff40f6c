import { describe, it, expect, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { exchange } from '../src/transport.js';
import { MISSING_EXECUTABLE, RESPONSE_THEN_LINGER, fixtureTarget, nodeScript } from './helpers.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('exchange', () => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stdio-conformance-transport-'));

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write the line with a trailing newline and close stdin', async () => {
    const raw = await exchange(nodeScript('process.stdin.pipe(process.stdout)'), '{"id":1}', { timeoutMs: 10000 });

    expect(raw).toEqual({
      status: 'completed',
      stdout: '{"id":1}\n',
      stderr: '',
      exitCode: 0,
      signal: null,
    });
  });

  it('should capture stderr and report a non-zero exit as completed', async () => {
    const script = "process.stdin.resume(); process.stdin.on('end', () => { process.stderr.write('boom'); process.exit(4); })";
    const raw = await exchange(nodeScript(script), 'x', { timeoutMs: 10000 });

    expect(raw.status).toBe('completed');
    expect(raw.stderr).toBe('boom');
    if (raw.status === 'completed') {
      expect(raw.exitCode).toBe(4);
    }
  });

  it('should kill a target that never exits', async () => {
    const startTime = Date.now();
    const raw = await exchange(fixtureTarget('hang'), '{}', { timeoutMs: 300 });

    expect(raw.status).toBe('timed-out');
    if (raw.status === 'timed-out') {
      expect(raw.timeoutMs).toBe(300);
      expect(raw.exited).toBe(false);
    }
    expect(Date.now() - startTime).toBeLessThan(5000);
  });

  it('should keep partial output captured before the timeout', async () => {
    const script = "process.stdout.write('partial'); setInterval(() => {}, 1000)";
    const raw = await exchange(nodeScript(script), '{}', { timeoutMs: 1500 });

    expect(raw.status).toBe('timed-out');
    expect(raw.stdout).toBe('partial');
  });

  it('should flag a target that exited while a descendant held stdout open', async () => {
    const startTime = Date.now();
    const raw = await exchange(nodeScript(RESPONSE_THEN_LINGER), '{}', { timeoutMs: 1000 });

    expect(raw.status).toBe('timed-out');
    expect(raw.stdout).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\n');
    if (raw.status === 'timed-out') {
      expect(raw.exited).toBe(true);
    }
    expect(Date.now() - startTime).toBeLessThan(5000);
  });

  it.skipIf(process.platform === 'win32')('should kill processes the target started when it times out', async () => {
    const marker = path.join(tmpDir, 'grandchild.log');
    const grandchild = `setInterval(() => require('fs').appendFileSync(${JSON.stringify(marker)}, '.'), 50)`;
    const script =
      `require('child_process').spawn(process.execPath, ['-e', ${JSON.stringify(grandchild)}], { stdio: 'ignore' });` +
      ' setInterval(() => {}, 1000)';

    const raw = await exchange(nodeScript(script), '{}', { timeoutMs: 1500 });
    expect(raw.status).toBe('timed-out');

    await sleep(200);
    const sizeAfterKill = fs.statSync(marker).size;
    await sleep(400);

    expect(sizeAfterKill).toBeGreaterThan(0);
    expect(fs.statSync(marker).size).toBe(sizeAfterKill);
  });

  it('should report a missing executable as spawn-failed', async () => {
    const raw = await exchange({ command: MISSING_EXECUTABLE }, '{}', { timeoutMs: 1000 });

    expect(raw.status).toBe('spawn-failed');
    if (raw.status === 'spawn-failed') {
      expect(raw.error).toContain('ENOENT');
    }
  });

  it('should report a file without execute permission as spawn-failed', async () => {
    const file = path.join(tmpDir, 'not-executable');
    fs.writeFileSync(file, '#!/bin/sh\necho hi\n', { mode: 0o644 });

    const raw = await exchange({ command: file }, '{}', { timeoutMs: 1000 });

    expect(raw.status).toBe('spawn-failed');
    if (raw.status === 'spawn-failed') {
      expect(raw.error).toContain('EACCES');
    }
  });

  it('should spawn a new process for every exchange', async () => {
    const script = "process.stdin.resume(); process.stdin.on('end', () => process.stdout.write(String(process.pid)))";
    const first = await exchange(nodeScript(script), '{}', { timeoutMs: 10000 });
    const second = await exchange(nodeScript(script), '{}', { timeoutMs: 10000 });

    expect(first.status).toBe('completed');
    expect(second.status).toBe('completed');
    expect(first.stdout).not.toBe('');
    expect(first.stdout).not.toBe(second.stdout);
  });
});
