import { generateId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import { SecretFetchError, StageExecutionError, TagflowError, errorMessage } from '../shared/errors.js';
import type { SecretProvider } from '../vault/types.js';
import { withSecretScope } from './credentials.js';
import { KILL_GRACE_MS } from './process.js';
import type { RunHistory } from './history.js';
import type {
  PipelineContext,
  PipelineDefinition,
  PipelineOutcome,
  Stage,
  StageReport,
  StageResult,
} from './types.js';

export const DEFAULT_STAGE_TIMEOUT_MS = 15 * 60 * 1000;

export interface RunnerContext {
  context: PipelineContext;
  secrets: SecretProvider;
  history?: RunHistory;
  dryRun?: boolean;
  /** Deadline for stages that do not declare their own `timeoutMs`. */
  stageTimeoutMs?: number;
  /** How long a timed-out stage body may take to wind down before the next stage starts. */
  settleGraceMs?: number;
}

function assertUniqueStageNames(stages: readonly Stage[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new Error(`Duplicate stage name in pipeline: ${stage.name}`);
    }
    seen.add(stage.name);
  }
}

/**
 * Settle with `work`, or reject with the signal's reason once it aborts. After
 * an abort the body gets up to `graceMs` to settle, so its killed children are
 * gone before the caller moves on.
 */
function raceDeadline<T>(work: Promise<T>, signal: AbortSignal, graceMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    let graceTimer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      graceTimer = setTimeout(() => reject(signal.reason), graceMs);
    };
    const finish = (settle: () => void) => {
      signal.removeEventListener('abort', onAbort);
      if (signal.aborted) {
        clearTimeout(graceTimer);
        reject(signal.reason);
      } else {
        settle();
      }
    };

    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

function skippedResult(stage: Stage, position: number): StageResult {
  return {
    stage: stage.name,
    position,
    kind: stage.kind,
    outcome: 'skipped',
    findings: [],
    artifacts: [],
    started_at: null,
    ended_at: null,
  };
}

/**
 * Run the stages in declared order. A failed blocking stage, or a secret that
 * cannot be fetched for any stage, halts the run and marks the rest skipped.
 * Advisory stages record their failures and findings and never halt the run.
 */
export async function runPipeline(
  pipeline: PipelineDefinition,
  ctx: RunnerContext,
): Promise<PipelineOutcome> {
  assertUniqueStageNames(pipeline.stages);

  const runId = generateId();
  const startedAt = new Date().toISOString();
  const dryRun = ctx.dryRun ?? false;

  ctx.history?.startRun({
    id: runId,
    pipelineId: pipeline.id,
    context: ctx.context,
    startedAt,
    dryRun,
  });

  logger.info('Run started', {
    run_id: runId,
    pipeline: pipeline.id,
    image: ctx.context.fullImageRef,
    branch: ctx.context.branch,
    build: ctx.context.buildNumber,
    dry_run: dryRun,
  });

  const stageResults: StageResult[] = [];
  const published: string[] = [];
  let failedStage: string | null = null;
  let failureReason: string | null = null;

  for (const [position, stage] of pipeline.stages.entries()) {
    const result =
      failedStage !== null ? skippedResult(stage, position) : await executeStage(stage, position, ctx, dryRun);

    stageResults.push(result);
    ctx.history?.recordStage(runId, result);

    if (result.outcome === 'failed') {
      failedStage = stage.name;
      failureReason = result.reason ?? 'unknown error';
      logger.error('Stage failed, halting run', { run_id: runId, stage: stage.name, reason: failureReason });
    } else if (result.outcome !== 'skipped') {
      published.push(...result.artifacts);
    }
  }

  const status = failedStage === null ? 'succeeded' : 'failed';
  const endedAt = new Date().toISOString();

  ctx.history?.finishRun(runId, status, endedAt, { stage: failedStage, reason: failureReason });

  logger.info('Run completed', { run_id: runId, status, failed_stage: failedStage });

  return {
    run_id: runId,
    pipeline_id: pipeline.id,
    status,
    context: ctx.context,
    stages: stageResults,
    published,
    failed_stage: failedStage,
    failure_reason: failureReason,
    dry_run: dryRun,
    started_at: startedAt,
    ended_at: endedAt,
  };
}

async function executeStage(
  stage: Stage,
  position: number,
  ctx: RunnerContext,
  dryRun: boolean,
): Promise<StageResult> {
  const startedAt = new Date().toISOString();
  const base = { stage: stage.name, position, kind: stage.kind, started_at: startedAt };

  logger.info('Stage started', { stage: stage.name, position, kind: stage.kind });

  // In dry-run mode, simulate success without fetching secrets or calling adapters
  if (dryRun) {
    logger.info('[DRY RUN] Would execute stage', { stage: stage.name, secrets: [...stage.secrets] });
    return {
      ...base,
      outcome: 'succeeded',
      findings: [],
      artifacts: [],
      output: { dry_run: true },
      ended_at: new Date().toISOString(),
    };
  }

  const timeoutMs = stage.timeoutMs ?? ctx.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
  const deadline = new AbortController();
  const timer = setTimeout(() => {
    deadline.abort(
      new StageExecutionError(`Stage ${stage.name} exceeded its ${timeoutMs}ms deadline`, { timedOut: true }),
    );
  }, timeoutMs);

  try {
    const report: StageReport = await withSecretScope(ctx.secrets, stage.secrets, (secrets) =>
      raceDeadline(
        stage.run({ pipeline: ctx.context, secrets, signal: deadline.signal, timeoutMs }),
        deadline.signal,
        ctx.settleGraceMs ?? KILL_GRACE_MS,
      ),
    );

    const findings = report.findings ?? [];
    const flagged = stage.kind === 'advisory' && (report.advisory !== undefined || findings.length > 0);
    if (flagged) {
      logger.warn('Advisory stage reported findings', {
        stage: stage.name,
        advisory: report.advisory,
        findings: findings.length,
      });
    }

    return {
      ...base,
      outcome: flagged ? 'advisory' : 'succeeded',
      reason: report.advisory,
      findings,
      artifacts: report.artifacts ?? [],
      output: report.output,
      ended_at: new Date().toISOString(),
    };
  } catch (err) {
    const reason = errorMessage(err);
    const errorCode = err instanceof TagflowError ? err.code : undefined;
    const endedAt = new Date().toISOString();

    // No stage may run, or be waived, without its declared credentials.
    if (stage.kind === 'advisory' && !(err instanceof SecretFetchError)) {
      logger.warn('Advisory stage failed, continuing', { stage: stage.name, error: reason });
      return {
        ...base,
        outcome: 'advisory',
        reason,
        error_code: errorCode,
        findings: [],
        artifacts: [],
        ended_at: endedAt,
      };
    }

    return {
      ...base,
      outcome: 'failed',
      reason,
      error_code: errorCode,
      findings: [],
      artifacts: [],
      ended_at: endedAt,
    };
  } finally {
    clearTimeout(timer);
  }
}
