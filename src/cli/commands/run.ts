import type { Command } from 'commander';
import { requireWorkspace, secretProviderFor, type BuildFlags } from '../cli-shared.js';
import { createPipelineContext, resolveBuildInputs } from '../../runtime/context.js';
import { RunHistory } from '../../runtime/history.js';
import { runPipeline } from '../../runtime/runner.js';
import { buildPipeline, createAdapters } from '../../runtime/pipelines.js';
import { formatRunSummary } from '../../runtime/summary.js';
import { ConfigError } from '../../shared/errors.js';

interface RunFlags extends BuildFlags {
  dryRun: boolean;
  force: boolean;
}

export function addBuildOptions(cmd: Command): Command {
  return cmd
    .option('--commit <sha>', 'Source commit hash (default: $GIT_COMMIT)')
    .option('--branch <name>', 'Source branch (default: $BRANCH_NAME or $GIT_BRANCH)')
    .option('--build-number <n>', 'Build number from the CI server (default: $BUILD_NUMBER)');
}

export function registerRunCommand(program: Command): void {
  addBuildOptions(program.command('run'))
    .description('Run the delivery pipeline for one commit and build number')
    .option('--dry-run', 'Walk every stage without fetching secrets or running tools', false)
    .option('--force', 'Run even if this commit and build number already failed', false)
    .action(async (opts: RunFlags) => {
      const workspace = requireWorkspace();
      const { config, paths, db } = workspace;

      const context = createPipelineContext(resolveBuildInputs(opts), {
        registryNamespace: config.registry.namespace,
        imageName: config.registry.image,
        releaseBranch: config.registry.release_branch,
      });

      const history = new RunHistory(db);
      const previous = history.findFailedRun(context.commitHash, context.buildNumber);
      if (previous && !opts.force && !opts.dryRun) {
        throw new ConfigError(
          `Build #${context.buildNumber} of ${context.commitHash} already failed (run ${previous.id}). ` +
            'Start a new build number, or pass --force to reuse it.',
        );
      }

      const pipeline = buildPipeline(
        config,
        { cwd: process.cwd(), reportsDir: paths.reportsDir },
        createAdapters(config, paths.cloneDir),
      );

      console.log(`Running pipeline: ${pipeline.name} -> ${context.fullImageRef}`);
      if (opts.dryRun) console.log('[DRY RUN] – no secrets fetched, no tools executed');

      const outcome = await runPipeline(pipeline, {
        context,
        secrets: secretProviderFor(workspace),
        history,
        dryRun: opts.dryRun,
        stageTimeoutMs: config.timeouts.stage_seconds * 1000,
      });

      console.log(`\n${formatRunSummary(outcome)}`);
      process.exitCode = outcome.status === 'succeeded' ? 0 : 1;
    });
}
