/**
 * File-backed development secret provider.
 * Persists secret bundles to .tagflow/vault.dev.json (plaintext – dev only).
 *
 * WARNING: Do NOT use in production. Secrets are stored unencrypted on disk.
 */
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { SecretFetchError } from '../shared/errors.js';
import type { SecretBundle, SecretProvider } from './types.js';

const VaultStoreSchema = z.object({
  secrets: z.record(
    z.object({
      fields: z.record(z.string()),
      updatedAt: z.string(),
    }),
  ),
});

type VaultStore = z.infer<typeof VaultStoreSchema>;

export class FileSecretProvider implements SecretProvider {
  readonly name = 'file';
  private readonly filePath: string;
  private store: VaultStore;

  constructor(filePath: string) {
    this.filePath = filePath;

    logger.warn(
      'FILE SECRET PROVIDER ACTIVE – secrets stored in plaintext on disk. ' +
        'Configure a HashiCorp Vault provider for real pipelines.',
      { path: filePath },
    );

    this.store = this.load();
  }

  private load(): VaultStore {
    if (!existsSync(this.filePath)) {
      return { secrets: {} };
    }
    try {
      const raw = readFileSync(this.filePath, 'utf8');
      return VaultStoreSchema.parse(JSON.parse(raw));
    } catch {
      logger.warn('Vault file corrupted – starting fresh', { path: this.filePath });
      return { secrets: {} };
    }
  }

  private persist(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true, mode: 0o700 });
    writeFileSync(this.filePath, JSON.stringify(this.store, null, 2), { encoding: 'utf8', mode: 0o600 });
  }

  async getSecretBundle(path: string): Promise<SecretBundle> {
    const entry = this.store.secrets[path];
    if (!entry || Object.keys(entry.fields).length === 0) {
      throw new SecretFetchError(path, `not found in ${this.filePath}`);
    }
    return Object.freeze({ ...entry.fields });
  }

  async setSecretField(path: string, field: string, value: string): Promise<void> {
    const current = this.store.secrets[path]?.fields ?? {};
    this.store.secrets[path] = {
      fields: { ...current, [field]: value },
      updatedAt: new Date().toISOString(),
    };
    this.persist();
  }

  async deleteSecret(path: string): Promise<void> {
    delete this.store.secrets[path];
    this.persist();
  }

  async listSecrets(): Promise<Array<{ path: string; fields: string[]; lastModified?: string }>> {
    return Object.entries(this.store.secrets).map(([path, entry]) => ({
      path,
      fields: Object.keys(entry.fields),
      lastModified: entry.updatedAt,
    }));
  }

  async status(): Promise<{ healthy: boolean; provider: string; message?: string }> {
    return {
      healthy: true,
      provider: 'file',
      message: `Dev file vault at ${this.filePath} (plaintext – not for production)`,
    };
  }
}
