import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a .tagflow workspace with a starter pipeline.yaml')
    .option('--namespace <namespace>', 'Registry namespace', 'example')
    .option('--image <name>', 'Image name', 'app')
    .option('--force', 'Overwrite an existing pipeline.yaml', false)
    .action((opts: { namespace: string; image: string; force: boolean }) => {
      const paths = initWorkspace({ namespace: opts.namespace, image: opts.image, force: opts.force });
      console.log('Workspace initialized!');
      console.log(`  Pipeline config: ${paths.config}`);
      console.log(`  Run history:     ${paths.stateDb}`);
      console.log('\nNext steps:');
      console.log(`  edit ${paths.config}           – set registry, test command and GitOps repository`);
      console.log('  tagflow vault set secret/ci/registry username <user>');
      console.log('  tagflow vault set secret/ci/registry token <token>');
      console.log('  tagflow run --commit <sha> --branch <branch> --build-number <n>');
    });
}
