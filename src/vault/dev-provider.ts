/**
 * Development-only in-memory secret provider.
 * NEVER use in production.
 */
import { logger } from '../shared/logger.js';
import { SecretFetchError } from '../shared/errors.js';
import type { SecretBundle, SecretProvider } from './types.js';

export class DevSecretProvider implements SecretProvider {
  readonly name = 'dev';
  private store = new Map<string, Map<string, string>>();

  constructor(seed: Record<string, Record<string, string>> = {}) {
    logger.warn(
      'DEV SECRET PROVIDER ACTIVE – secrets stored in memory only. ' +
        'Configure a HashiCorp Vault provider for real pipelines.',
    );
    for (const [path, fields] of Object.entries(seed)) {
      this.store.set(path, new Map(Object.entries(fields)));
    }
  }

  async getSecretBundle(path: string): Promise<SecretBundle> {
    const fields = this.store.get(path);
    if (!fields || fields.size === 0) {
      throw new SecretFetchError(path, 'not found');
    }
    return Object.freeze(Object.fromEntries(fields));
  }

  async setSecretField(path: string, field: string, value: string): Promise<void> {
    const fields = this.store.get(path) ?? new Map<string, string>();
    fields.set(field, value);
    this.store.set(path, fields);
  }

  async deleteSecret(path: string): Promise<void> {
    this.store.delete(path);
  }

  async listSecrets(): Promise<Array<{ path: string; fields: string[] }>> {
    return Array.from(this.store.entries()).map(([path, fields]) => ({
      path,
      fields: Array.from(fields.keys()),
    }));
  }

  async status(): Promise<{ healthy: boolean; provider: string; message?: string }> {
    return {
      healthy: true,
      provider: 'dev',
      message: 'Development in-memory secret store – not for production',
    };
  }
}
