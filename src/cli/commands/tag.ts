import type { Command } from 'commander';
import { requireWorkspace, type BuildFlags } from '../cli-shared.js';
import { createPipelineContext, resolveBuildInputs } from '../../runtime/context.js';
import { addBuildOptions } from './run.js';

export function registerTagCommand(program: Command): void {
  addBuildOptions(program.command('tag'))
    .description('Print the image tag and registry destinations for a build')
    .option('--json', 'Print as JSON', false)
    .action((opts: BuildFlags & { json: boolean }) => {
      const { config } = requireWorkspace();
      const context = createPipelineContext(resolveBuildInputs(opts), {
        registryNamespace: config.registry.namespace,
        imageName: config.registry.image,
        releaseBranch: config.registry.release_branch,
      });

      if (opts.json) {
        console.log(JSON.stringify(context, null, 2));
        return;
      }
      console.log(`Tag:          ${context.imageTag}`);
      console.log(`Image:        ${context.fullImageRef}`);
      console.log('Destinations:');
      context.destinations.forEach((d) => console.log(`  ${d}`));
    });
}
