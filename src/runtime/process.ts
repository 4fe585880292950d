import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { logger } from '../shared/logger.js';
import { StageExecutionError, errorMessage } from '../shared/errors.js';

export type SpawnFn = typeof spawn;

export interface CommandOptions {
  cwd?: string;
  /** Merged over process.env; `undefined` removes a variable. */
  env?: Record<string, string | undefined>;
  /** Written to stdin, which is then closed. */
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  spawn?: SpawnFn;
  /** Prefix for streamed output lines, usually the stage name. */
  label?: string;
}

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Time between SIGTERM and SIGKILL for a process past its deadline. */
export const KILL_GRACE_MS = 5_000;
const STDERR_TAIL_LINES = 20;

export function formatCommand(bin: string, args: readonly string[]): string {
  return [bin, ...args.map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a))].join(' ');
}

function buildEnv(overrides: Record<string, string | undefined> = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  for (const [k, v] of Object.entries(overrides)) {
    if (v === undefined) delete env[k];
    else env[k] = v;
  }
  return env;
}

/** Emits complete lines from a chunked stream to the logger. */
function lineStreamer(label: string, stream: 'stdout' | 'stderr'): { push: (chunk: Buffer) => void; flush: () => void } {
  let pending = '';
  const emit = (line: string) => {
    if (line.trim()) logger.debug(`[${label}] ${line}`, { stream });
  };
  return {
    push(chunk) {
      pending += chunk.toString('utf8');
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? '';
      lines.forEach(emit);
    },
    flush() {
      emit(pending);
      pending = '';
    },
  };
}

/**
 * Run a command without a shell and capture its output. Resolves for any exit
 * code; rejects with StageExecutionError when the process cannot be started,
 * exceeds `timeoutMs`, or is cancelled through `signal`.
 */
export function runCommand(bin: string, args: readonly string[], opts: CommandOptions = {}): Promise<CommandResult> {
  const spawnImpl = opts.spawn ?? spawn;
  const command = formatCommand(bin, args);
  const label = opts.label ?? bin;
  const startedAt = Date.now();

  return new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(new StageExecutionError(`${command} not started: deadline exceeded`, { timedOut: true }));
      return;
    }

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawnImpl(bin, [...args], {
        cwd: opts.cwd,
        env: buildEnv(opts.env),
        stdio: 'pipe',
      });
    } catch (err) {
      reject(new StageExecutionError(`Failed to start ${command}: ${errorMessage(err)}`, {}, { cause: err }));
      return;
    }

    logger.debug('Process started', { command, cwd: opts.cwd, label });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const outLines = lineStreamer(label, 'stdout');
    const errLines = lineStreamer(label, 'stderr');
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = () => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      killTimer.unref();
    };

    const timeoutTimer =
      opts.timeoutMs !== undefined && opts.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, opts.timeoutMs)
        : undefined;

    const onAbort = () => {
      cancelled = true;
      terminate();
    };
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      opts.signal?.removeEventListener('abort', onAbort);
      fn();
    };

    child.stdout.on('data', (chunk: Buffer | string) => {
      const buf = Buffer.from(chunk);
      stdoutChunks.push(buf);
      outLines.push(buf);
    });
    child.stderr.on('data', (chunk: Buffer | string) => {
      const buf = Buffer.from(chunk);
      stderrChunks.push(buf);
      errLines.push(buf);
    });

    child.on('error', (err) => {
      settle(() =>
        reject(new StageExecutionError(`Failed to run ${command}: ${err.message}`, {}, { cause: err })),
      );
    });

    child.on('close', (code) => {
      outLines.flush();
      errLines.flush();
      const stdout = Buffer.concat(stdoutChunks).toString('utf8');
      const stderr = Buffer.concat(stderrChunks).toString('utf8');
      const durationMs = Date.now() - startedAt;

      if (timedOut) {
        settle(() =>
          reject(
            new StageExecutionError(`${command} timed out after ${opts.timeoutMs}ms`, {
              exitCode: code,
              timedOut: true,
            }),
          ),
        );
        return;
      }
      if (cancelled) {
        settle(() =>
          reject(new StageExecutionError(`${command} killed: deadline exceeded`, { exitCode: code, timedOut: true })),
        );
        return;
      }
      settle(() => resolve({ command, exitCode: code ?? -1, stdout, stderr, durationMs }));
    });

    try {
      if (opts.input !== undefined) child.stdin.write(opts.input);
      child.stdin.end();
    } catch (err) {
      child.kill();
      settle(() => reject(new StageExecutionError(`Failed to write stdin of ${command}`, {}, { cause: err })));
    }
  });
}

export function stderrTail(result: Pick<CommandResult, 'stderr' | 'stdout'>): string {
  const text = result.stderr.trim() || result.stdout.trim();
  return text.split(/\r?\n/).slice(-STDERR_TAIL_LINES).join('\n');
}

/** Throw StageExecutionError unless the command exited 0. */
export function assertSuccess(result: CommandResult): CommandResult {
  if (result.exitCode !== 0) {
    const tail = stderrTail(result);
    throw new StageExecutionError(
      `${result.command} exited with code ${result.exitCode}${tail ? `: ${tail}` : ''}`,
      { exitCode: result.exitCode },
    );
  }
  return result;
}

export async function runChecked(bin: string, args: readonly string[], opts: CommandOptions = {}): Promise<CommandResult> {
  return assertSuccess(await runCommand(bin, args, opts));
}
