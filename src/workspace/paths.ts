import { join } from 'node:path';
import type { TagflowPaths } from './types.js';

export function getTagflowPaths(cwd: string = process.cwd()): TagflowPaths {
  const root = join(cwd, '.tagflow');
  return {
    root,
    config: join(root, 'pipeline.yaml'),
    stateDb: join(root, 'state.db'),
    vaultFile: join(root, 'vault.dev.json'),
    reportsDir: join(root, 'reports'),
    cloneDir: join(root, 'gitops-clone'),
  };
}
