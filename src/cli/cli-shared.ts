import type Database from 'better-sqlite3';
import { getTagflowPaths } from '../workspace/paths.js';
import { readPipelineConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import { getSecretProvider, type SecretProvider } from '../vault/index.js';
import type { PipelineConfig, TagflowPaths } from '../workspace/types.js';

export interface WorkspaceContext {
  paths: TagflowPaths;
  config: PipelineConfig;
  db: Database.Database;
}

/**
 * Load pipeline.yaml and open the state db. Throws ConfigError when the
 * workspace is missing or invalid; the top-level handler reports it.
 */
export function requireWorkspace(cwd?: string): WorkspaceContext {
  const paths = getTagflowPaths(cwd);
  const config = readPipelineConfig(paths.config);
  const db = openDb(paths.stateDb);
  return { paths, config, db };
}

export function secretProviderFor(workspace: Pick<WorkspaceContext, 'paths' | 'config'>): SecretProvider {
  return getSecretProvider({
    provider: workspace.config.vault.provider,
    filePath: workspace.paths.vaultFile,
    address: workspace.config.vault.address,
    mount: workspace.config.vault.mount,
  });
}

export interface BuildFlags {
  commit?: string;
  branch?: string;
  buildNumber?: string;
}
