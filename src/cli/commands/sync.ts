import type { Command } from 'commander';
import { requireWorkspace, secretProviderFor, type BuildFlags } from '../cli-shared.js';
import { createPipelineContext, resolveBuildInputs } from '../../runtime/context.js';
import { RunHistory } from '../../runtime/history.js';
import { runPipeline } from '../../runtime/runner.js';
import { buildSyncPipeline, createAdapters } from '../../runtime/pipelines.js';
import { formatRunSummary } from '../../runtime/summary.js';
import { ConfigError } from '../../shared/errors.js';
import { addBuildOptions } from './run.js';

export function registerSyncCommand(program: Command): void {
  addBuildOptions(program.command('sync'))
    .description('Point the GitOps manifest at an already-published image')
    .option('--dry-run', 'Show what would run without touching the repository', false)
    .option('--force', 'Sync even if no recorded run published this build', false)
    .action(async (opts: BuildFlags & { dryRun: boolean; force: boolean }) => {
      const workspace = requireWorkspace();
      const { config, paths, db } = workspace;
      const context = createPipelineContext(resolveBuildInputs(opts), {
        registryNamespace: config.registry.namespace,
        imageName: config.registry.image,
        releaseBranch: config.registry.release_branch,
      });

      const history = new RunHistory(db);
      if (!opts.force && !opts.dryRun && !history.findPublishedRun(context.commitHash, context.buildNumber)) {
        throw new ConfigError(
          `No run published ${context.fullImageRef}: build #${context.buildNumber} of ${context.commitHash} ` +
            'has no successful build stage. Run `tagflow run` first, or pass --force.',
        );
      }

      const outcome = await runPipeline(buildSyncPipeline(config, createAdapters(config, paths.cloneDir)), {
        context,
        secrets: secretProviderFor(workspace),
        history,
        dryRun: opts.dryRun,
        stageTimeoutMs: config.timeouts.stage_seconds * 1000,
      });

      console.log(formatRunSummary(outcome));
      process.exitCode = outcome.status === 'succeeded' ? 0 : 1;
    });
}
