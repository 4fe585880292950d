import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger } from '../shared/logger.js';
import { withRetry } from '../shared/retry.js';
import { StageExecutionError } from '../shared/errors.js';
import { runChecked, runCommand, stderrTail, type SpawnFn } from '../runtime/process.js';

export interface RegistryCredential {
  username: string;
  token: string;
}

export interface BuildRequest {
  contextDir: string;
  dockerfile?: string;
  /** Fully-qualified `namespace/name:tag` destinations; the first is the pinned ref. */
  destinations: readonly string[];
  /** Registry host for `docker login`; Docker Hub when omitted. */
  registryHost?: string;
  credential: RegistryCredential;
  labels?: Record<string, string>;
  signal?: AbortSignal;
}

export interface BuildResult {
  published: string[];
}

/** Builds and publishes one image; the runner sees only this contract. */
export interface ArtifactBuilder {
  buildAndPush(req: BuildRequest): Promise<BuildResult>;
}

export interface DockerArtifactBuilderOptions {
  dockerBin?: string;
  tmpDir?: string;
  spawn?: SpawnFn;
  networkAttempts?: number;
  retryIntervalMillis?: number;
}

/**
 * Builds one image with every destination tag and pushes each tag. Registry
 * credentials are written only to a scratch DOCKER_CONFIG directory that is
 * removed when the call returns.
 */
export class DockerArtifactBuilder implements ArtifactBuilder {
  private readonly dockerBin: string;

  constructor(private readonly opts: DockerArtifactBuilderOptions = {}) {
    this.dockerBin = opts.dockerBin ?? 'docker';
  }

  async buildAndPush(req: BuildRequest): Promise<BuildResult> {
    if (req.destinations.length === 0) {
      throw new StageExecutionError('No image destinations given');
    }

    const scratchBase = this.opts.tmpDir ?? tmpdir();
    const dockerConfig = await mkdtemp(join(scratchBase, 'tagflow-docker-'));
    const base = {
      env: { DOCKER_CONFIG: dockerConfig },
      signal: req.signal,
      spawn: this.opts.spawn,
      label: 'docker',
    };

    try {
      const loginArgs = ['login', '--username', req.credential.username, '--password-stdin'];
      if (req.registryHost) loginArgs.push(req.registryHost);
      const login = await runCommand(this.dockerBin, loginArgs, { ...base, input: req.credential.token });
      if (login.exitCode !== 0) {
        throw new StageExecutionError(
          `docker login to ${req.registryHost ?? 'default registry'} failed: ${stderrTail(login)}`,
          { exitCode: login.exitCode },
        );
      }

      const buildArgs = ['build'];
      if (req.dockerfile) buildArgs.push('--file', req.dockerfile);
      for (const dest of req.destinations) buildArgs.push('--tag', dest);
      for (const [key, value] of Object.entries(req.labels ?? {})) buildArgs.push('--label', `${key}=${value}`);
      buildArgs.push(req.contextDir);

      logger.info('Building image', { destinations: [...req.destinations], context: req.contextDir });
      await runChecked(this.dockerBin, buildArgs, base);

      const published: string[] = [];
      for (const dest of req.destinations) {
        await withRetry(() => runChecked(this.dockerBin, ['push', dest], base), {
          attempts: this.opts.networkAttempts ?? 3,
          retryIntervalMillis: this.opts.retryIntervalMillis ?? 2_000,
          shouldRetry: (err) => err instanceof StageExecutionError && !err.timedOut,
          signal: req.signal,
          label: `docker push ${dest}`,
        });
        published.push(dest);
        logger.info('Image pushed', { image: dest });
      }

      return { published };
    } finally {
      await rm(dockerConfig, { recursive: true, force: true });
    }
  }
}
