/**
 * HashiCorp Vault provider (KV secrets engine, version 2).
 *
 * Connection via environment variables unless given explicitly:
 *   VAULT_ADDR   – required, e.g. https://vault.internal:8200
 *   VAULT_TOKEN  – token with read access to the CI secret paths
 *
 * Logical paths follow the `vault kv` CLI convention: `secret/ci/registry`
 * reads `ci/registry` from the engine mounted at `secret`.
 */
import { z } from 'zod';
import { SecretFetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SecretBundle, SecretProvider } from './types.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HashicorpVaultOptions {
  address?: string;
  token?: string;
  mount?: string;
  namespace?: string;
  requestTimeoutMs?: number;
  fetch?: FetchFn;
}

const KvReadSchema = z.object({
  data: z.object({
    data: z.record(z.string()).nullable(),
    metadata: z
      .object({
        updated_time: z.string().optional(),
        created_time: z.string().optional(),
      })
      .nullable()
      .optional(),
  }),
});

const KvListSchema = z.object({
  data: z.object({ keys: z.array(z.string()) }),
});

export class HashicorpVaultProvider implements SecretProvider {
  readonly name = 'hashicorp';
  private readonly address: string;
  private readonly token: string;
  private readonly mount: string;
  private readonly namespace?: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(opts: HashicorpVaultOptions = {}) {
    const address = opts.address ?? process.env['VAULT_ADDR'];
    const token = opts.token ?? process.env['VAULT_TOKEN'];
    if (!address) {
      throw new Error('VAULT_ADDR environment variable is required for the hashicorp secret provider.');
    }
    if (!token) {
      throw new Error('VAULT_TOKEN environment variable is required for the hashicorp secret provider.');
    }
    this.address = address.replace(/\/+$/, '');
    this.token = token;
    this.mount = (opts.mount ?? 'secret').replace(/^\/+|\/+$/g, '');
    this.namespace = opts.namespace ?? process.env['VAULT_NAMESPACE'];
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 10_000;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Strip the mount prefix from a logical path: `secret/ci/git` -> `ci/git`. */
  relativePath(path: string): string {
    const trimmed = path.replace(/^\/+|\/+$/g, '');
    return trimmed.startsWith(`${this.mount}/`) ? trimmed.slice(this.mount.length + 1) : trimmed;
  }

  private url(kind: 'data' | 'metadata', path: string): string {
    const encoded = this.relativePath(path)
      .split('/')
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `${this.address}/v1/${this.mount}/${kind}/${encoded}`;
  }

  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers: Record<string, string> = {
      'X-Vault-Token': this.token,
      Accept: 'application/json',
    };
    if (this.namespace) headers['X-Vault-Namespace'] = this.namespace;
    if (init.body !== undefined) headers['Content-Type'] = 'application/json';
    return this.fetchImpl(url, {
      ...init,
      headers,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
  }

  private async readKv(path: string): Promise<z.infer<typeof KvReadSchema> | null> {
    const res = await this.request(this.url('data', path));
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new Error(`Vault responded ${res.status} ${res.statusText}`);
    }
    return KvReadSchema.parse(await res.json());
  }

  async getSecretBundle(path: string): Promise<SecretBundle> {
    let body: z.infer<typeof KvReadSchema> | null;
    try {
      body = await this.readKv(path);
    } catch (err) {
      throw new SecretFetchError(path, errorMessage(err), { cause: err });
    }
    const fields = body?.data.data;
    if (!fields || Object.keys(fields).length === 0) {
      throw new SecretFetchError(path, 'not found');
    }
    return Object.freeze({ ...fields });
  }

  async setSecretField(path: string, field: string, value: string): Promise<void> {
    const current = (await this.readKv(path))?.data.data ?? {};
    const res = await this.request(this.url('data', path), {
      method: 'POST',
      body: JSON.stringify({ data: { ...current, [field]: value } }),
    });
    if (!res.ok) {
      throw new Error(`Vault write to ${path} failed: ${res.status} ${res.statusText}`);
    }
  }

  async deleteSecret(path: string): Promise<void> {
    const res = await this.request(this.url('metadata', path), { method: 'DELETE' });
    if (!res.ok && res.status !== 404) {
      throw new Error(`Vault delete of ${path} failed: ${res.status} ${res.statusText}`);
    }
  }

  async listSecrets(): Promise<Array<{ path: string; fields: string[]; lastModified?: string }>> {
    const results: Array<{ path: string; fields: string[]; lastModified?: string }> = [];
    const walk = async (prefix: string): Promise<void> => {
      const res = await this.request(`${this.url('metadata', prefix)}?list=true`);
      if (res.status === 404) return;
      if (!res.ok) throw new Error(`Vault list failed: ${res.status} ${res.statusText}`);
      const { data } = KvListSchema.parse(await res.json());
      for (const key of data.keys) {
        const child = prefix ? `${prefix}/${key.replace(/\/$/, '')}` : key.replace(/\/$/, '');
        if (key.endsWith('/')) {
          await walk(child);
          continue;
        }
        const body = await this.readKv(child);
        results.push({
          path: `${this.mount}/${child}`,
          fields: Object.keys(body?.data.data ?? {}),
          lastModified: body?.data.metadata?.updated_time,
        });
      }
    };
    await walk('');
    return results;
  }

  async status(): Promise<{ healthy: boolean; provider: string; message?: string }> {
    try {
      const res = await this.request(`${this.address}/v1/sys/health`);
      const healthy = res.status === 200;
      return {
        healthy,
        provider: 'hashicorp',
        message: healthy ? `Connected to ${this.address}` : `Vault health returned ${res.status}`,
      };
    } catch (err) {
      logger.debug('Vault health check failed', { error: errorMessage(err) });
      return { healthy: false, provider: 'hashicorp', message: errorMessage(err) };
    }
  }
}
