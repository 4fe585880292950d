import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { RunHistory } from '../runtime/history.js';
import type { StageResult } from '../runtime/types.js';
import { createTestDb, makeContext } from './test-helpers.js';

function result(overrides: Partial<StageResult> = {}): StageResult {
  return {
    stage: 'test',
    position: 0,
    kind: 'blocking',
    outcome: 'succeeded',
    findings: [],
    artifacts: [],
    started_at: '2026-10-19T08:00:00.000Z',
    ended_at: '2026-10-19T08:01:00.000Z',
    ...overrides,
  };
}

describe('RunHistory', () => {
  let db: Database.Database;
  let history: RunHistory;

  beforeEach(() => {
    db = createTestDb();
    history = new RunHistory(db);
  });

  afterEach(() => {
    db.close();
  });

  const start = (id: string, startedAt: string, opts: { buildNumber?: number; dryRun?: boolean } = {}) =>
    history.startRun({
      id,
      pipelineId: 'app',
      context: makeContext({ buildNumber: opts.buildNumber ?? 42 }),
      startedAt,
      dryRun: opts.dryRun ?? false,
    });

  it('lists runs newest first', () => {
    start('r1', '2026-10-19T08:00:00.000Z');
    start('r2', '2026-10-19T09:00:00.000Z', { buildNumber: 43 });
    history.finishRun('r1', 'succeeded', '2026-10-19T08:05:00.000Z', { stage: null, reason: null });

    const runs = history.listRuns();
    expect(runs.map((r) => r.id)).toEqual(['r2', 'r1']);
    expect(runs[0]).toMatchObject({ status: 'running', build_number: 43, image_ref: 'ns/app:a1b2c3d4-43' });
    expect(runs[1]).toMatchObject({ status: 'succeeded', ended_at: '2026-10-19T08:05:00.000Z', dry_run: false });
    expect(history.listRuns(1)).toHaveLength(1);
  });

  it('stores stage results in position order with redacted reasons', () => {
    start('r1', '2026-10-19T08:00:00.000Z');
    history.recordStage('r1', result({ stage: 'build', position: 1, outcome: 'failed', reason: 'password=hunter22' }));
    history.recordStage('r1', result());

    expect(history.getStageResults('r1')).toEqual([
      { stage: 'test', position: 0, kind: 'blocking', outcome: 'succeeded', reason: undefined },
      { stage: 'build', position: 1, kind: 'blocking', outcome: 'failed', reason: '[REDACTED]' },
    ]);
  });

  it('finds an earlier failed run for the same commit and build number', () => {
    start('r1', '2026-10-19T08:00:00.000Z');
    history.finishRun('r1', 'failed', '2026-10-19T08:01:00.000Z', { stage: 'test', reason: 'Tests failed' });

    expect(history.findFailedRun('a1b2c3d4', 42)).toMatchObject({ id: 'r1', failed_stage: 'test' });
    expect(history.findFailedRun('a1b2c3d4', 41)).toBeNull();
  });

  it('ignores failed dry runs', () => {
    start('r1', '2026-10-19T08:00:00.000Z', { dryRun: true });
    history.finishRun('r1', 'failed', '2026-10-19T08:01:00.000Z', { stage: 'test', reason: 'x' });
    expect(history.findFailedRun('a1b2c3d4', 42)).toBeNull();
  });

  it('finds a run whose build stage published the image, even if a later stage failed', () => {
    start('r1', '2026-10-19T08:00:00.000Z');
    history.recordStage('r1', result({ stage: 'build', position: 1 }));
    history.recordStage('r1', result({ stage: 'gitops-sync', position: 2, outcome: 'failed', reason: 'push rejected' }));
    history.finishRun('r1', 'failed', '2026-10-19T08:01:00.000Z', { stage: 'gitops-sync', reason: 'push rejected' });

    expect(history.findPublishedRun('a1b2c3d4', 42)).toMatchObject({ id: 'r1', status: 'failed' });
    expect(history.findPublishedRun('a1b2c3d4', 43)).toBeNull();
  });

  it('does not count a failed build or a dry run as published', () => {
    start('r1', '2026-10-19T08:00:00.000Z');
    history.recordStage('r1', result({ stage: 'build', position: 1, outcome: 'failed', reason: 'docker push failed' }));
    start('r2', '2026-10-19T09:00:00.000Z', { dryRun: true });
    history.recordStage('r2', result({ stage: 'build', position: 1 }));

    expect(history.findPublishedRun('a1b2c3d4', 42)).toBeNull();
  });
});
