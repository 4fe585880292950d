import type { z } from 'zod';
import type { PipelineConfigSchema } from '../shared/schemas.js';

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface TagflowPaths {
  root: string;        // .tagflow/
  config: string;      // .tagflow/pipeline.yaml
  stateDb: string;     // .tagflow/state.db
  vaultFile: string;   // .tagflow/vault.dev.json
  reportsDir: string;  // .tagflow/reports/
  cloneDir: string;    // .tagflow/gitops-clone/
}
