import { mkdirSync, existsSync } from 'node:fs';
import { getTagflowPaths } from './paths.js';
import { openDb } from './db.js';
import { writePipelineConfig } from './config.js';
import type { PipelineConfigInput } from '../shared/schemas.js';
import type { TagflowPaths } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  pipelineId?: string;
  namespace?: string;
  image?: string;
}

export function defaultPipelineConfig(opts: InitOptions = {}): PipelineConfigInput {
  const image = opts.image ?? 'app';
  return {
    pipeline_id: opts.pipelineId ?? image,
    registry: {
      namespace: opts.namespace ?? 'example',
      image,
      release_branch: 'main',
      credentials: 'secret/ci/registry',
    },
    project: { dir: '.', context: '.', dockerfile: 'Dockerfile' },
    test: {
      command: ['npm', 'test', '--', '--reporters=default', '--reporters=jest-junit'],
      report: 'junit.xml',
    },
    scan: {
      enabled: true,
      bin: 'trivy',
      source_severity: 'HIGH,CRITICAL',
      image_severity: 'CRITICAL',
    },
    gitops: {
      repo_url: 'https://git.example.com/platform/deployments.git',
      branch: 'main',
      manifest_path: `apps/${image}/deployment.yaml`,
      credentials: 'secret/ci/git',
      author_name: 'tagflow',
      author_email: 'tagflow@localhost',
    },
    timeouts: { stage_seconds: 900, network_attempts: 3, retry_delay_ms: 2000 },
    vault: { provider: 'file' },
  };
}

/** Create `.tagflow/` with a starter pipeline.yaml and the run-history database. */
export function initWorkspace(opts: InitOptions = {}): TagflowPaths {
  const paths = getTagflowPaths(opts.cwd);

  if (existsSync(paths.config) && !opts.force) {
    throw new Error(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  for (const dir of [paths.root, paths.reportsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  writePipelineConfig(paths.config, defaultPipelineConfig(opts));
  openDb(paths.stateDb);

  return paths;
}
