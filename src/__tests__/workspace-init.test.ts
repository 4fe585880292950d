import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { initWorkspace } from '../workspace/init.js';
import { parsePipelineConfig, readPipelineConfig } from '../workspace/config.js';
import { _resetDb } from '../workspace/db.js';
import { ConfigError } from '../shared/errors.js';
import { createTempWorkspace, minimalConfig } from './test-helpers.js';

describe('initWorkspace', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'tagflow-ws-init-'));
    _resetDb();
  });

  afterEach(() => {
    _resetDb();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates .tagflow/ with a loadable pipeline.yaml and state db', () => {
    const paths = initWorkspace({ cwd: tmpDir, namespace: 'acme', image: 'shop' });
    expect(existsSync(join(tmpDir, '.tagflow/pipeline.yaml'))).toBe(true);
    expect(existsSync(join(tmpDir, '.tagflow/state.db'))).toBe(true);
    expect(existsSync(join(tmpDir, '.tagflow/reports'))).toBe(true);

    const config = readPipelineConfig(paths.config);
    expect(config.registry).toMatchObject({ namespace: 'acme', image: 'shop', release_branch: 'main' });
    expect(config.gitops.manifest_path).toBe('apps/shop/deployment.yaml');
  });

  it('throws if the workspace already exists without --force', () => {
    initWorkspace({ cwd: tmpDir });
    _resetDb();
    expect(() => initWorkspace({ cwd: tmpDir })).toThrow('already exists');
  });

  it('reinitializes with --force', () => {
    initWorkspace({ cwd: tmpDir });
    _resetDb();
    const paths = initWorkspace({ cwd: tmpDir, image: 'api', force: true });
    expect(readPipelineConfig(paths.config).registry.image).toBe('api');
  });
});

describe('pipeline config', () => {
  it('applies defaults', () => {
    const config = parsePipelineConfig(minimalConfig());
    expect(config.registry.release_branch).toBe('main');
    expect(config.registry.credentials).toBe('secret/ci/registry');
    expect(config.project).toEqual({ dir: '.', context: '.', dockerfile: 'Dockerfile' });
    expect(config.scan).toEqual({
      enabled: true,
      bin: 'trivy',
      source_severity: 'HIGH,CRITICAL',
      image_severity: 'CRITICAL',
    });
    expect(config.gitops.branch).toBe('main');
    expect(config.gitops.credentials).toBe('secret/ci/git');
    expect(config.timeouts).toEqual({ stage_seconds: 900, network_attempts: 3, retry_delay_ms: 2000 });
    expect(config.vault.provider).toBe('file');
    expect(config.lint).toBeUndefined();
  });

  it('names the offending field', () => {
    expect(() => parsePipelineConfig(minimalConfig({ test: { command: [], report: 'junit.xml' } }), 'p.yaml')).toThrow(
      'Invalid p.yaml: test.command: Array must contain at least 1 element(s)',
    );
  });

  it('rejects an unknown vault provider', () => {
    expect(() =>
      parsePipelineConfig({ ...minimalConfig(), vault: { provider: 'azure' } }),
    ).toThrow(ConfigError);
  });

  it('reports a missing workspace', () => {
    expect(() => readPipelineConfig(join(tmpdir(), 'tagflow-nowhere', 'pipeline.yaml'))).toThrow(
      'Workspace not initialized',
    );
  });

  it('reports unparsable YAML as ConfigError', () => {
    const ws = createTempWorkspace();
    try {
      writeFileSync(ws.configPath, 'registry: [unclosed', 'utf8');
      expect(() => readPipelineConfig(ws.configPath)).toThrow(ConfigError);
    } finally {
      ws.cleanup();
    }
  });

  it('loads a file written by the helper', () => {
    const ws = createTempWorkspace(minimalConfig({ lint: { command: ['npm', 'run', 'lint'] } }));
    try {
      expect(readPipelineConfig(ws.configPath).lint).toEqual({ command: ['npm', 'run', 'lint'] });
    } finally {
      ws.cleanup();
    }
  });
});
