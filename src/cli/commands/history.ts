import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import { RunHistory } from '../../runtime/history.js';

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history [runId]')
    .description('List recent runs, or the stage results of one run')
    .option('-n, --limit <n>', 'Number of runs to list', parseLimit, 20)
    .action((runId: string | undefined, opts: { limit: number }) => {
      const { db } = requireWorkspace();
      const history = new RunHistory(db);

      if (runId) {
        const stages = history.getStageResults(runId);
        if (stages.length === 0) {
          console.log(`No stage results for run ${runId}`);
          return;
        }
        for (const s of stages) {
          console.log(`  ${s.position}. ${s.stage} (${s.kind}): ${s.outcome}${s.reason ? ` - ${s.reason}` : ''}`);
        }
        return;
      }

      const runs = history.listRuns(opts.limit);
      if (runs.length === 0) {
        console.log('No runs recorded yet.');
        return;
      }
      for (const r of runs) {
        const flags = r.dry_run ? ' [dry run]' : '';
        const failed = r.failed_stage ? ` at ${r.failed_stage}` : '';
        console.log(`${r.id}  ${r.status}${failed}${flags}  ${r.image_ref}  (${r.branch}, #${r.build_number})`);
      }
    });
}
