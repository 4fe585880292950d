import { describe, it, expect } from '@jest/globals';
import { assertSuccess, formatCommand, runChecked, runCommand, stderrTail } from '../runtime/process.js';
import { StageExecutionError } from '../shared/errors.js';
import { createFakeSpawn } from './test-helpers.js';

describe('runCommand', () => {
  it('captures output and exit code without throwing on failure', async () => {
    const { spawn, calls } = createFakeSpawn(() => ({ stdout: 'hello\n', stderr: 'warn\n', exitCode: 3 }));
    const result = await runCommand('tool', ['--flag', 'a b'], { cwd: '/work', spawn });

    expect(result).toMatchObject({ command: 'tool --flag "a b"', exitCode: 3, stdout: 'hello\n', stderr: 'warn\n' });
    expect(calls[0]).toMatchObject({ bin: 'tool', args: ['--flag', 'a b'], cwd: '/work' });
  });

  it('writes input to stdin', async () => {
    const { spawn, calls } = createFakeSpawn();
    await runCommand('docker', ['login', '--password-stdin'], { input: 'test-secret', spawn });
    expect(calls[0]?.stdin).toBe('test-secret');
  });

  it('merges env overrides and removes undefined ones', async () => {
    process.env['TAGFLOW_TEST_REMOVE_ME'] = 'x';
    const { spawn, calls } = createFakeSpawn();
    await runCommand('git', ['status'], { env: { GIT_TERMINAL_PROMPT: '0', TAGFLOW_TEST_REMOVE_ME: undefined }, spawn });
    delete process.env['TAGFLOW_TEST_REMOVE_ME'];

    expect(calls[0]?.env['GIT_TERMINAL_PROMPT']).toBe('0');
    expect(calls[0]?.env).not.toHaveProperty('TAGFLOW_TEST_REMOVE_ME');
  });

  it('rejects when the binary cannot be started', async () => {
    const { spawn } = createFakeSpawn(() => ({ error: new Error('spawn trivy ENOENT') }));
    await expect(runCommand('trivy', ['fs', '.'], { spawn })).rejects.toThrow('Failed to run trivy fs .: spawn trivy ENOENT');
  });

  it('kills a process that outlives its timeout', async () => {
    const { spawn, calls } = createFakeSpawn(() => ({ hang: true }));
    const err = await runCommand('sleep', ['100'], { timeoutMs: 10, spawn }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StageExecutionError);
    expect(err).toMatchObject({ message: 'sleep 100 timed out after 10ms', timedOut: true });
    expect(calls[0]?.killSignals).toEqual(['SIGTERM']);
  });

  it('kills a process when the signal aborts', async () => {
    const { spawn, calls } = createFakeSpawn(() => ({ hang: true }));
    const controller = new AbortController();
    const pending = runCommand('sleep', ['100'], { signal: controller.signal, spawn });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toThrow('sleep 100 killed: deadline exceeded');
    expect(calls[0]?.killSignals).toEqual(['SIGTERM']);
  });

  it('does not start when the signal is already aborted', async () => {
    const { spawn, calls } = createFakeSpawn();
    const controller = new AbortController();
    controller.abort();
    await expect(runCommand('echo', ['x'], { signal: controller.signal, spawn })).rejects.toThrow(
      'echo x not started: deadline exceeded',
    );
    expect(calls).toHaveLength(0);
  });
});

describe('runChecked', () => {
  it('throws StageExecutionError with the stderr tail on a non-zero exit', async () => {
    const { spawn } = createFakeSpawn(() => ({ stderr: 'line1\nfatal: bad thing\n', exitCode: 2 }));
    await expect(runChecked('make', ['lint'], { spawn })).rejects.toThrow(
      'make lint exited with code 2: line1\nfatal: bad thing',
    );
  });
});

describe('helpers', () => {
  it('formats commands with quoting', () => {
    expect(formatCommand('git', ['commit', '-m', 'Update image'])).toBe('git commit -m "Update image"');
  });

  it('falls back to stdout for the tail and keeps the last 20 lines', () => {
    const stdout = Array.from({ length: 25 }, (_, i) => `l${i}`).join('\n');
    const tail = stderrTail({ stdout, stderr: '' });
    expect(tail.split('\n')).toHaveLength(20);
    expect(tail.split('\n')[0]).toBe('l5');
  });

  it('assertSuccess passes a zero exit through', () => {
    const result = { command: 'true', exitCode: 0, stdout: '', stderr: '', durationMs: 1 };
    expect(assertSuccess(result)).toBe(result);
  });
});
