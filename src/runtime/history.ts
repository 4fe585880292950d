import type Database from 'better-sqlite3';
import { redact } from '../shared/redact.js';
import type { PipelineContext, RunStatus, StageResult } from './types.js';

export interface RunRecord {
  id: string;
  pipeline_id: string;
  commit_hash: string;
  branch: string;
  build_number: number;
  image_ref: string;
  status: RunStatus;
  failed_stage: string | null;
  failure_reason: string | null;
  started_at: string;
  ended_at: string | null;
  dry_run: boolean;
}

interface RunRow extends Omit<RunRecord, 'dry_run'> {
  dry_run: number;
}

function toRecord(row: RunRow): RunRecord {
  return { ...row, dry_run: row.dry_run === 1 };
}

/** Run history persisted in the workspace state database. */
export class RunHistory {
  constructor(private readonly db: Database.Database) {}

  startRun(run: {
    id: string;
    pipelineId: string;
    context: PipelineContext;
    startedAt: string;
    dryRun: boolean;
  }): void {
    this.db
      .prepare(
        `INSERT INTO runs (id, pipeline_id, commit_hash, branch, build_number, image_ref, status, started_at, dry_run)
         VALUES (?, ?, ?, ?, ?, ?, 'running', ?, ?)`,
      )
      .run(
        run.id,
        run.pipelineId,
        run.context.commitHash,
        run.context.branch,
        run.context.buildNumber,
        run.context.fullImageRef,
        run.startedAt,
        run.dryRun ? 1 : 0,
      );
  }

  recordStage(runId: string, result: StageResult): void {
    this.db
      .prepare(
        `INSERT INTO stage_results
           (run_id, position, stage, kind, outcome, reason, error_code, findings_json, artifacts_json, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        runId,
        result.position,
        result.stage,
        result.kind,
        result.outcome,
        result.reason !== undefined ? redact(result.reason) : null,
        result.error_code ?? null,
        JSON.stringify(result.findings),
        JSON.stringify(result.artifacts),
        result.started_at,
        result.ended_at,
      );
  }

  finishRun(
    runId: string,
    status: Exclude<RunStatus, 'running'>,
    endedAt: string,
    failure: { stage: string | null; reason: string | null },
  ): void {
    this.db
      .prepare(`UPDATE runs SET status = ?, ended_at = ?, failed_stage = ?, failure_reason = ? WHERE id = ?`)
      .run(status, endedAt, failure.stage, failure.reason !== null ? redact(failure.reason) : null, runId);
  }

  listRuns(limit = 20): RunRecord[] {
    const rows = this.db
      .prepare(`SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?`)
      .all(limit) as RunRow[];
    return rows.map(toRecord);
  }

  getStageResults(runId: string): Array<Pick<StageResult, 'stage' | 'position' | 'kind' | 'outcome' | 'reason'>> {
    const rows = this.db
      .prepare(`SELECT stage, position, kind, outcome, reason FROM stage_results WHERE run_id = ? ORDER BY position`)
      .all(runId) as Array<{
      stage: string;
      position: number;
      kind: StageResult['kind'];
      outcome: StageResult['outcome'];
      reason: string | null;
    }>;
    return rows.map((r) => ({ ...r, reason: r.reason ?? undefined }));
  }

  /** Most recent failed, non-dry run for a commit and build number, if any. */
  findFailedRun(commitHash: string, buildNumber: number): RunRecord | null {
    const row = this.db
      .prepare(
        `SELECT * FROM runs
         WHERE commit_hash = ? AND build_number = ? AND status = 'failed' AND dry_run = 0
         ORDER BY started_at DESC LIMIT 1`,
      )
      .get(commitHash, buildNumber) as RunRow | undefined;
    return row ? toRecord(row) : null;
  }

  /** Most recent non-dry run for a commit and build number whose `build` stage succeeded. */
  findPublishedRun(commitHash: string, buildNumber: number): RunRecord | null {
    const row = this.db
      .prepare(
        `SELECT runs.* FROM runs
         JOIN stage_results ON stage_results.run_id = runs.id
         WHERE runs.commit_hash = ? AND runs.build_number = ? AND runs.dry_run = 0
           AND stage_results.stage = 'build' AND stage_results.outcome = 'succeeded'
         ORDER BY runs.started_at DESC LIMIT 1`,
      )
      .get(commitHash, buildNumber) as RunRow | undefined;
    return row ? toRecord(row) : null;
  }
}
