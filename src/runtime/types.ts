import type { SecretBundle } from '../vault/types.js';

export type RunStatus = 'running' | 'succeeded' | 'failed';

/** Immutable per-run record; every stage reads it, none may change it. */
export interface PipelineContext {
  readonly commitHash: string;
  readonly branch: string;
  readonly buildNumber: number;
  readonly registryNamespace: string;
  readonly imageName: string;
  readonly releaseBranch: string;
  readonly imageTag: string;
  readonly fullImageRef: string;
  /** Registry destinations: the pinned ref, plus `latest` on the release branch. */
  readonly destinations: readonly string[];
}

export type StageKind = 'blocking' | 'advisory';

/**
 * Credentials handed to a running stage. Only paths the stage declared can be
 * read, and the bundles are wiped as soon as the stage returns.
 */
export interface SecretScope {
  get(path: string): SecretBundle;
}

export interface StageContext {
  pipeline: PipelineContext;
  secrets: SecretScope;
  /** Aborted when the stage deadline passes; forward it to every external call. */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface AdvisoryScanFinding {
  severity: string;
  count: number;
  target: string;
}

export interface StageReport {
  output?: unknown;
  /** Image references or files the stage published. */
  artifacts?: string[];
  /** Non-blocking findings, surfaced in the run summary. */
  findings?: AdvisoryScanFinding[];
  /** Set by advisory stages to report a failure signal without blocking. */
  advisory?: string;
}

export interface Stage {
  name: string;
  kind: StageKind;
  /** Secret paths acquired immediately before `run` and released right after. */
  secrets: readonly string[];
  timeoutMs?: number;
  run(ctx: StageContext): Promise<StageReport>;
}

export interface PipelineDefinition {
  id: string;
  name: string;
  stages: readonly Stage[];
}

export type StageOutcome = 'succeeded' | 'failed' | 'advisory' | 'skipped';

export interface StageResult {
  stage: string;
  position: number;
  kind: StageKind;
  outcome: StageOutcome;
  reason?: string;
  error_code?: string;
  findings: AdvisoryScanFinding[];
  artifacts: string[];
  output?: unknown;
  started_at: string | null;
  ended_at: string | null;
}

export interface PipelineOutcome {
  run_id: string;
  pipeline_id: string;
  status: Exclude<RunStatus, 'running'>;
  context: PipelineContext;
  stages: StageResult[];
  published: string[];
  failed_stage: string | null;
  failure_reason: string | null;
  dry_run: boolean;
  started_at: string;
  ended_at: string;
}
