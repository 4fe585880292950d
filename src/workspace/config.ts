import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import { ZodError } from 'zod';
import type { PipelineConfig } from './types.js';
import { PipelineConfigSchema, type PipelineConfigInput } from '../shared/schemas.js';
import { ConfigError, errorMessage } from '../shared/errors.js';

function describeIssues(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/** Validate an already-parsed document; `source` names it in error messages. */
export function parsePipelineConfig(raw: unknown, source = 'pipeline config'): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function readPipelineConfig(configPath: string): PipelineConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Workspace not initialized: ${configPath} not found. Run \`tagflow init\` first.`);
  }
  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  return parsePipelineConfig(parsed, configPath);
}

export function writePipelineConfig(configPath: string, config: PipelineConfigInput): void {
  writeFileSync(configPath, dump(config), 'utf8');
}
