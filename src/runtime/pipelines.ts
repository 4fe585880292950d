import { copyFile, mkdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { DockerArtifactBuilder, type ArtifactBuilder } from '../adapters/builder.js';
import { TrivyScanner, type Scanner, type ScanResult } from '../adapters/scanner.js';
import { JUnitTestRunner, type TestRunner } from '../adapters/test-runner.js';
import { CliGitClient } from '../gitops/git.js';
import { GitOpsSyncer, type ManifestSyncer } from '../gitops/syncer.js';
import type { PipelineConfig } from '../workspace/types.js';
import { requireField } from './credentials.js';
import { runChecked, type SpawnFn } from './process.js';
import type { PipelineDefinition, Stage, StageContext, StageReport } from './types.js';

export const STAGE_NAMES = {
  lint: 'lint',
  sourceScan: 'source-scan',
  test: 'test',
  build: 'build',
  imageScan: 'image-scan',
  gitopsSync: 'gitops-sync',
} as const;

export interface PipelineAdapters {
  builder: ArtifactBuilder;
  scanner: Scanner;
  tests: TestRunner;
  syncer: ManifestSyncer;
  /** Used by command stages such as lint. */
  spawn?: SpawnFn;
}

export interface PipelineLocation {
  /** Directory that relative project paths resolve against. */
  cwd: string;
  /** Test and scan reports are copied under `<reportsDir>/<imageTag>/`. */
  reportsDir: string;
}

export function createAdapters(config: PipelineConfig, cloneDir: string): PipelineAdapters {
  const retry = {
    networkAttempts: config.timeouts.network_attempts,
    retryIntervalMillis: config.timeouts.retry_delay_ms,
  };
  return {
    builder: new DockerArtifactBuilder(retry),
    scanner: new TrivyScanner({ trivyBin: config.scan.bin }),
    tests: new JUnitTestRunner(),
    syncer: new GitOpsSyncer(
      {
        branch: config.gitops.branch,
        manifestPath: config.gitops.manifest_path,
        cloneDir: config.gitops.clone_dir ?? cloneDir,
        author: { name: config.gitops.author_name, email: config.gitops.author_email },
      },
      { git: new CliGitClient({ timeoutMs: config.timeouts.stage_seconds * 1000 }), ...retry },
    ),
  };
}

function reportDir(loc: PipelineLocation, ctx: StageContext): string {
  return join(loc.reportsDir, ctx.pipeline.imageTag);
}

function scanReport(result: ScanResult, severity: string): StageReport {
  const report: StageReport = { findings: result.findings, output: { report: result.reportPath } };
  if (!result.passed) {
    const total = result.findings.reduce((n, f) => n + f.count, 0);
    report.advisory =
      result.reportError !== undefined
        ? `findings at ${severity} reported, but the scan report is unreadable: ${result.reportError}`
        : `${total} finding(s) at ${severity}`;
  }
  return report;
}

function lintStage(command: readonly string[], projectDir: string, adapters: PipelineAdapters): Stage {
  return {
    name: STAGE_NAMES.lint,
    kind: 'blocking',
    secrets: [],
    async run(ctx) {
      const [bin, ...args] = command;
      if (!bin) return {};
      const result = await runChecked(bin, args, {
        cwd: projectDir,
        signal: ctx.signal,
        spawn: adapters.spawn,
        label: STAGE_NAMES.lint,
      });
      return { output: { command: result.command, duration_ms: result.durationMs } };
    },
  };
}

function sourceScanStage(config: PipelineConfig, projectDir: string, loc: PipelineLocation, adapters: PipelineAdapters): Stage {
  const severity = config.scan.source_severity;
  return {
    name: STAGE_NAMES.sourceScan,
    kind: 'advisory',
    secrets: [],
    async run(ctx) {
      const result = await adapters.scanner.scan({
        target: { kind: 'fs', path: projectDir },
        severity,
        reportPath: join(reportDir(loc, ctx), 'source-scan.json'),
        signal: ctx.signal,
      });
      return scanReport(result, severity);
    },
  };
}

function testStage(config: PipelineConfig, projectDir: string, loc: PipelineLocation, adapters: PipelineAdapters): Stage {
  return {
    name: STAGE_NAMES.test,
    kind: 'blocking',
    secrets: [],
    async run(ctx) {
      const summary = await adapters.tests.run({
        projectDir,
        command: config.test.command,
        reportPath: config.test.report,
        signal: ctx.signal,
      });
      const dir = reportDir(loc, ctx);
      await mkdir(dir, { recursive: true });
      const kept = join(dir, basename(summary.reportPath));
      await copyFile(summary.reportPath, kept);
      return { output: { ...summary, reportPath: kept } };
    },
  };
}

function buildStage(config: PipelineConfig, projectDir: string, adapters: PipelineAdapters): Stage {
  const secretPath = config.registry.credentials;
  return {
    name: STAGE_NAMES.build,
    kind: 'blocking',
    secrets: [secretPath],
    async run(ctx) {
      const bundle = ctx.secrets.get(secretPath);
      const { published } = await adapters.builder.buildAndPush({
        contextDir: resolve(projectDir, config.project.context),
        dockerfile: resolve(projectDir, config.project.dockerfile),
        destinations: ctx.pipeline.destinations,
        registryHost: config.registry.host,
        credential: {
          username: requireField(bundle, secretPath, 'username'),
          token: requireField(bundle, secretPath, 'token'),
        },
        labels: {
          'org.opencontainers.image.revision': ctx.pipeline.commitHash,
          'org.opencontainers.image.version': ctx.pipeline.imageTag,
        },
        signal: ctx.signal,
      });
      return { artifacts: published };
    },
  };
}

function imageScanStage(config: PipelineConfig, loc: PipelineLocation, adapters: PipelineAdapters): Stage {
  const severity = config.scan.image_severity;
  return {
    name: STAGE_NAMES.imageScan,
    kind: 'advisory',
    secrets: [],
    async run(ctx) {
      const result = await adapters.scanner.scan({
        target: { kind: 'image', ref: ctx.pipeline.fullImageRef },
        severity,
        reportPath: join(reportDir(loc, ctx), 'image-scan.json'),
        signal: ctx.signal,
      });
      return scanReport(result, severity);
    },
  };
}

/** Terminal stage: point the deployment manifest at the pinned image. */
export function gitopsSyncStage(config: PipelineConfig, adapters: PipelineAdapters): Stage {
  const secretPath = config.gitops.credentials;
  return {
    name: STAGE_NAMES.gitopsSync,
    kind: 'blocking',
    secrets: [secretPath],
    async run(ctx) {
      const bundle = ctx.secrets.get(secretPath);
      const result = await adapters.syncer.sync(
        ctx.pipeline,
        config.gitops.repo_url,
        {
          username: requireField(bundle, secretPath, 'username'),
          token: requireField(bundle, secretPath, 'token'),
        },
        ctx.signal,
      );
      return { output: result };
    },
  };
}

/**
 * The delivery pipeline in its fixed order: lint (when configured), source
 * scan, test, build, image scan, GitOps sync. Scans are left out when
 * `scan.enabled` is false.
 */
export function buildPipeline(
  config: PipelineConfig,
  loc: PipelineLocation,
  adapters: PipelineAdapters,
): PipelineDefinition {
  const projectDir = resolve(loc.cwd, config.project.dir);
  const stages: Stage[] = [];

  if (config.lint) stages.push(lintStage(config.lint.command, projectDir, adapters));
  if (config.scan.enabled) stages.push(sourceScanStage(config, projectDir, loc, adapters));
  stages.push(testStage(config, projectDir, loc, adapters));
  stages.push(buildStage(config, projectDir, adapters));
  if (config.scan.enabled) stages.push(imageScanStage(config, loc, adapters));
  stages.push(gitopsSyncStage(config, adapters));

  return { id: config.pipeline_id, name: `${config.registry.namespace}/${config.registry.image}`, stages };
}

/** Just the sync stage, for re-pointing the manifest at an already-published image. */
export function buildSyncPipeline(config: PipelineConfig, adapters: PipelineAdapters): PipelineDefinition {
  return {
    id: `${config.pipeline_id}:sync`,
    name: `${config.registry.namespace}/${config.registry.image} (sync only)`,
    stages: [gitopsSyncStage(config, adapters)],
  };
}
