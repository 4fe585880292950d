import { readFile, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import { logger } from '../shared/logger.js';
import { withRetry } from '../shared/retry.js';
import {
  CloneError,
  CommitPushError,
  PatchApplyError,
  SyncInProgressError,
  errorMessage,
} from '../shared/errors.js';
import type { PipelineContext } from '../runtime/types.js';
import { applyManifestPatch } from './manifest.js';
import { CliGitClient, type GitAuthor, type GitClient, type GitCredential } from './git.js';

export type SyncResult =
  | { kind: 'no_change'; manifestPath: string }
  | { kind: 'committed'; commitMessage: string; pushedRef: string; commitId: string };

export interface GitOpsTarget {
  /** Primary branch the reconciler watches. */
  branch: string;
  /** Manifest file path inside the repository. */
  manifestPath: string;
  /** Local working directory; owned exclusively by one sync at a time. */
  cloneDir: string;
  author: GitAuthor;
}

export interface ManifestSyncer {
  sync(ctx: PipelineContext, repoUrl: string, credential: GitCredential, signal?: AbortSignal): Promise<SyncResult>;
}

export interface GitOpsSyncerOptions {
  git?: GitClient;
  /** Attempts for clone and for a push that was not rejected by the remote. */
  networkAttempts?: number;
  retryIntervalMillis?: number;
}

// Clone directories currently owned by a sync in this process.
const activeClones = new Set<string>();

export function buildCommitMessage(ctx: PipelineContext): string {
  return [
    `Update ${ctx.registryNamespace}/${ctx.imageName} image to ${ctx.imageTag}`,
    '',
    `Build: #${ctx.buildNumber}`,
    `Commit: ${ctx.commitHash}`,
    `Branch: ${ctx.branch}`,
  ].join('\n');
}

function resolveInside(root: string, relPath: string): string {
  const full = resolve(root, relPath);
  const rel = relative(root, full);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new PatchApplyError(relPath, `Manifest path ${relPath} escapes the repository`);
  }
  return full;
}

/**
 * Points the manifest repository at a pinned image: clone, patch, diff, and
 * commit+push only when something changed. The local clone is removed before
 * `sync` returns, whatever the outcome.
 */
export class GitOpsSyncer implements ManifestSyncer {
  private readonly git: GitClient;
  private readonly networkAttempts: number;
  private readonly retryIntervalMillis: number;

  constructor(
    private readonly target: GitOpsTarget,
    opts: GitOpsSyncerOptions = {},
  ) {
    this.git = opts.git ?? new CliGitClient();
    this.networkAttempts = opts.networkAttempts ?? 3;
    this.retryIntervalMillis = opts.retryIntervalMillis ?? 2_000;
  }

  async sync(
    ctx: PipelineContext,
    repoUrl: string,
    credential: GitCredential,
    signal?: AbortSignal,
  ): Promise<SyncResult> {
    const cloneDir = resolve(this.target.cloneDir);
    if (activeClones.has(cloneDir)) {
      throw new SyncInProgressError(cloneDir);
    }
    activeClones.add(cloneDir);

    try {
      await rm(cloneDir, { recursive: true, force: true });

      await withRetry(
        async (attempt) => {
          if (attempt > 1) await rm(cloneDir, { recursive: true, force: true });
          await this.git.clone(repoUrl, cloneDir, { branch: this.target.branch, credential, signal });
        },
        {
          attempts: this.networkAttempts,
          retryIntervalMillis: this.retryIntervalMillis,
          shouldRetry: (err) => err instanceof CloneError,
          signal,
          label: 'GitOps clone',
        },
      );

      const manifestFile = resolveInside(cloneDir, this.target.manifestPath);
      let content: string;
      try {
        content = await readFile(manifestFile, 'utf8');
      } catch (err) {
        throw new PatchApplyError(
          this.target.manifestPath,
          `Manifest ${this.target.manifestPath} not readable: ${errorMessage(err)}`,
        );
      }

      const patch = applyManifestPatch(
        content,
        { repository: `${ctx.registryNamespace}/${ctx.imageName}`, fullImageRef: ctx.fullImageRef },
        this.target.manifestPath,
      );
      if (patch.changed) {
        await writeFile(manifestFile, patch.content, 'utf8');
      }

      const changed = await this.git.changedFiles(cloneDir, signal);
      if (changed.length === 0) {
        logger.info('Manifest already references image, nothing to commit', {
          manifest: this.target.manifestPath,
          image: ctx.fullImageRef,
        });
        return { kind: 'no_change', manifestPath: this.target.manifestPath };
      }

      const commitMessage = buildCommitMessage(ctx);
      const commitId = await this.git.commit(
        cloneDir,
        [this.target.manifestPath],
        commitMessage,
        this.target.author,
        signal,
      );

      await withRetry(
        () => this.git.push(cloneDir, this.target.branch, { credential, signal }),
        {
          attempts: this.networkAttempts,
          retryIntervalMillis: this.retryIntervalMillis,
          // A rejected push will be rejected again; only transport failures are retried.
          shouldRetry: (err) => err instanceof CommitPushError && !err.rejected,
          signal,
          label: 'GitOps push',
        },
      );

      const pushedRef = `refs/heads/${this.target.branch}`;
      logger.info('Manifest updated', {
        manifest: this.target.manifestPath,
        image: ctx.fullImageRef,
        ref: pushedRef,
        commit: commitId,
      });
      return { kind: 'committed', commitMessage, pushedRef, commitId };
    } finally {
      try {
        await rm(cloneDir, { recursive: true, force: true });
      } catch (err) {
        logger.error('Failed to remove GitOps clone directory', { path: cloneDir, error: errorMessage(err) });
      }
      activeClones.delete(cloneDir);
    }
  }
}
