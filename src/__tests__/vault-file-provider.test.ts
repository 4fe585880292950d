import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSecretProvider } from '../vault/file-provider.js';
import { DevSecretProvider } from '../vault/dev-provider.js';
import { SecretFetchError } from '../shared/errors.js';
import { getSecretProvider, _resetSecretProvider } from '../vault/index.js';

describe('FileSecretProvider', () => {
  let tmpDir: string;
  let vaultPath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'tagflow-vault-test-'));
    vaultPath = join(tmpDir, 'vault.dev.json');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('stores fields and returns them as a bundle', async () => {
    const vault = new FileSecretProvider(vaultPath);
    await vault.setSecretField('secret/ci/git', 'username', 'ci-bot');
    await vault.setSecretField('secret/ci/git', 'token', 'test-secret');
    expect(await vault.getSecretBundle('secret/ci/git')).toEqual({ username: 'ci-bot', token: 'test-secret' });
  });

  it('throws SecretFetchError for a missing path', async () => {
    const vault = new FileSecretProvider(vaultPath);
    await expect(vault.getSecretBundle('secret/ci/none')).rejects.toThrow(SecretFetchError);
  });

  it('deletes a secret', async () => {
    const vault = new FileSecretProvider(vaultPath);
    await vault.setSecretField('secret/ci/git', 'token', 'test-secret');
    await vault.deleteSecret('secret/ci/git');
    await expect(vault.getSecretBundle('secret/ci/git')).rejects.toThrow(SecretFetchError);
  });

  it('persists across re-instantiation with owner-only permissions', async () => {
    const vault1 = new FileSecretProvider(vaultPath);
    await vault1.setSecretField('secret/ci/registry', 'token', 'test-secret');

    const vault2 = new FileSecretProvider(vaultPath);
    expect(await vault2.getSecretBundle('secret/ci/registry')).toEqual({ token: 'test-secret' });
    expect(statSync(vaultPath).mode & 0o777).toBe(0o600);
  });

  it('lists paths and field names without values', async () => {
    const vault = new FileSecretProvider(vaultPath);
    await vault.setSecretField('secret/ci/git', 'username', 'ci-bot');
    await vault.setSecretField('secret/ci/git', 'token', 'test-secret');
    await vault.setSecretField('secret/ci/registry', 'token', 'test-secret');
    const secrets = await vault.listSecrets();
    expect(secrets.map((s) => [s.path, s.fields])).toEqual([
      ['secret/ci/git', ['username', 'token']],
      ['secret/ci/registry', ['token']],
    ]);
    expect(JSON.stringify(secrets)).not.toContain('test-secret');
  });

  it('starts empty when the file is corrupted', async () => {
    writeFileSync(vaultPath, '{not json', 'utf8');
    const vault = new FileSecretProvider(vaultPath);
    expect(await vault.listSecrets()).toEqual([]);
  });

  it('returns healthy status', async () => {
    const status = await new FileSecretProvider(vaultPath).status();
    expect(status.healthy).toBe(true);
    expect(status.provider).toBe('file');
  });
});

describe('DevSecretProvider', () => {
  it('serves seeded bundles and rejects unknown paths', async () => {
    const vault = new DevSecretProvider({ 'secret/ci/git': { token: 'test-secret' } });
    expect(await vault.getSecretBundle('secret/ci/git')).toEqual({ token: 'test-secret' });
    await expect(vault.getSecretBundle('secret/ci/other')).rejects.toThrow(
      'Failed to fetch secret secret/ci/other: not found',
    );
  });

  it('returns frozen bundles', async () => {
    const vault = new DevSecretProvider({ 'secret/ci/git': { token: 'test-secret' } });
    expect(Object.isFrozen(await vault.getSecretBundle('secret/ci/git'))).toBe(true);
  });
});

describe('getSecretProvider', () => {
  const saved = process.env['TAGFLOW_VAULT_PROVIDER'];

  beforeEach(() => {
    delete process.env['TAGFLOW_VAULT_PROVIDER'];
    _resetSecretProvider();
  });

  afterEach(() => {
    if (saved === undefined) delete process.env['TAGFLOW_VAULT_PROVIDER'];
    else process.env['TAGFLOW_VAULT_PROVIDER'] = saved;
    _resetSecretProvider();
  });

  it('caches the provider per configuration', () => {
    const first = getSecretProvider({ provider: 'file', filePath: '/tmp/a.json' });
    expect(first.name).toBe('file');
    expect(getSecretProvider({ provider: 'file', filePath: '/tmp/a.json' })).toBe(first);
    expect(getSecretProvider({ provider: 'file', filePath: '/tmp/b.json' })).not.toBe(first);
  });

  it('lets the environment override the configured provider', () => {
    process.env['TAGFLOW_VAULT_PROVIDER'] = 'dev';
    expect(getSecretProvider({ provider: 'file', filePath: '/tmp/a.json' }).name).toBe('dev');
  });

  it('rejects unknown providers', () => {
    expect(() => getSecretProvider({ provider: 'keyring' })).toThrow('Unknown secret provider: keyring');
  });
});
