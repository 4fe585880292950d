import { CloneError, CommitPushError, StageExecutionError, errorMessage } from '../shared/errors.js';
import { runCommand, stderrTail, type CommandOptions, type CommandResult, type SpawnFn } from '../runtime/process.js';

export interface GitCredential {
  username: string;
  token: string;
}

export interface GitAuthor {
  name: string;
  email: string;
}

/** The git operations the syncer needs; swapped for a fake in tests. */
export interface GitClient {
  clone(repoUrl: string, dir: string, opts: { branch: string; credential: GitCredential; signal?: AbortSignal }): Promise<void>;
  /** Paths with uncommitted changes relative to HEAD. */
  changedFiles(dir: string, signal?: AbortSignal): Promise<string[]>;
  /** Stage `files`, commit, and return the new HEAD commit id. */
  commit(dir: string, files: string[], message: string, author: GitAuthor, signal?: AbortSignal): Promise<string>;
  push(dir: string, branch: string, opts: { credential: GitCredential; signal?: AbortSignal }): Promise<void>;
}

export interface CliGitClientOptions {
  gitBin?: string;
  timeoutMs?: number;
  spawn?: SpawnFn;
}

const REJECTED_PUSH = /\[rejected\]|non-fast-forward|fetch first|\[remote rejected\]/i;

/**
 * Per-process git configuration carrying the credential as an HTTP header.
 * It lives only in the child's environment, never in the clone's .git/config
 * or in the remote URL.
 */
export function credentialEnv(credential: GitCredential): Record<string, string> {
  const basic = Buffer.from(`${credential.username}:${credential.token}`).toString('base64');
  return {
    GIT_CONFIG_COUNT: '1',
    GIT_CONFIG_KEY_0: 'http.extraHeader',
    GIT_CONFIG_VALUE_0: `Authorization: Basic ${basic}`,
  };
}

export class CliGitClient implements GitClient {
  private readonly gitBin: string;

  constructor(private readonly opts: CliGitClientOptions = {}) {
    this.gitBin = opts.gitBin ?? 'git';
  }

  private exec(args: string[], extra: Partial<CommandOptions> = {}): Promise<CommandResult> {
    return runCommand(this.gitBin, args, {
      label: 'git',
      timeoutMs: this.opts.timeoutMs,
      spawn: this.opts.spawn,
      ...extra,
      env: { GIT_TERMINAL_PROMPT: '0', ...(extra.env ?? {}) },
    });
  }

  async clone(
    repoUrl: string,
    dir: string,
    opts: { branch: string; credential: GitCredential; signal?: AbortSignal },
  ): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.exec(['clone', '--depth', '1', '--branch', opts.branch, '--single-branch', repoUrl, dir], {
        env: credentialEnv(opts.credential),
        signal: opts.signal,
      });
    } catch (err) {
      throw new CloneError(`Clone of ${repoUrl} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (result.exitCode !== 0) {
      throw new CloneError(`Clone of ${repoUrl} failed (exit ${result.exitCode}): ${stderrTail(result)}`);
    }
  }

  async changedFiles(dir: string, signal?: AbortSignal): Promise<string[]> {
    const result = await this.exec(['-C', dir, 'status', '--porcelain', '--untracked-files=no'], { signal });
    if (result.exitCode !== 0) {
      throw new StageExecutionError(`git status failed: ${stderrTail(result)}`, { exitCode: result.exitCode });
    }
    return result.stdout
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => line.slice(3).trim());
  }

  async commit(
    dir: string,
    files: string[],
    message: string,
    author: GitAuthor,
    signal?: AbortSignal,
  ): Promise<string> {
    const add = await this.exec(['-C', dir, 'add', '--', ...files], { signal });
    if (add.exitCode !== 0) {
      throw new CommitPushError(`git add failed: ${stderrTail(add)}`);
    }
    const commit = await this.exec(
      ['-C', dir, '-c', `user.name=${author.name}`, '-c', `user.email=${author.email}`, 'commit', '-m', message],
      { signal },
    );
    if (commit.exitCode !== 0) {
      throw new CommitPushError(`git commit failed: ${stderrTail(commit)}`);
    }
    const head = await this.exec(['-C', dir, 'rev-parse', 'HEAD'], { signal });
    if (head.exitCode !== 0) {
      throw new CommitPushError(`git rev-parse failed: ${stderrTail(head)}`);
    }
    return head.stdout.trim();
  }

  async push(dir: string, branch: string, opts: { credential: GitCredential; signal?: AbortSignal }): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.exec(['-C', dir, 'push', 'origin', `HEAD:refs/heads/${branch}`], {
        env: credentialEnv(opts.credential),
        signal: opts.signal,
      });
    } catch (err) {
      throw new CommitPushError(`Push to ${branch} failed: ${errorMessage(err)}`, {}, { cause: err });
    }
    if (result.exitCode !== 0) {
      const tail = stderrTail(result);
      throw new CommitPushError(`Push to ${branch} failed (exit ${result.exitCode}): ${tail}`, {
        rejected: REJECTED_PUSH.test(tail),
      });
    }
  }
}
