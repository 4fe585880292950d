import { redact } from '../shared/redact.js';
import type { PipelineOutcome, StageOutcome } from './types.js';

const ICONS: Record<StageOutcome, string> = {
  succeeded: '[ok]',
  failed: '[fail]',
  advisory: '[warn]',
  skipped: '[skip]',
};

/** Human-readable run report printed at the end of `tagflow run`. */
export function formatRunSummary(outcome: PipelineOutcome): string {
  const { context } = outcome;
  const lines: string[] = [];

  lines.push(`Run ${outcome.run_id}: ${outcome.status.toUpperCase()}${outcome.dry_run ? ' (dry run)' : ''}`);
  lines.push(`  Pipeline: ${outcome.pipeline_id}`);
  lines.push(`  Commit:   ${context.commitHash}`);
  lines.push(`  Branch:   ${context.branch}`);
  lines.push(`  Build:    #${context.buildNumber}`);
  lines.push(`  Image:    ${context.fullImageRef}`);

  lines.push('', 'Stages:');
  for (const stage of outcome.stages) {
    let line = `  ${ICONS[stage.outcome]} ${stage.stage} (${stage.kind}): ${stage.outcome}`;
    if (stage.reason) line += ` - ${redact(stage.reason)}`;
    lines.push(line);
  }

  const advisories = outcome.stages.filter((s) => s.outcome === 'advisory');
  if (advisories.length > 0) {
    lines.push('', 'Advisories:');
    for (const stage of advisories) {
      if (stage.findings.length === 0) {
        lines.push(`  ${stage.stage}: ${redact(stage.reason ?? 'flagged')}`);
      }
      for (const f of stage.findings) {
        lines.push(`  ${stage.stage}: ${f.count} ${f.severity} in ${f.target}`);
      }
    }
  }

  if (outcome.published.length > 0) {
    lines.push('', 'Published:');
    outcome.published.forEach((ref) => lines.push(`  ${ref}`));
  }

  if (outcome.failed_stage !== null) {
    lines.push('', `Failed at stage "${outcome.failed_stage}": ${redact(outcome.failure_reason ?? 'unknown error')}`);
  }

  return lines.join('\n');
}
