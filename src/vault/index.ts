import type { SecretProvider } from './types.js';
import { FileSecretProvider } from './file-provider.js';
import { DevSecretProvider } from './dev-provider.js';
import { HashicorpVaultProvider } from './hashicorp-provider.js';

export type { SecretProvider, SecretBundle } from './types.js';

export type SecretProviderName = 'dev' | 'file' | 'hashicorp';

export interface SecretProviderOptions {
  provider?: SecretProviderName | string;
  filePath?: string;
  address?: string;
  mount?: string;
}

let _activeProvider: SecretProvider | null = null;
let _activeKey: string | null = null;

function cacheKey(opts: Required<Pick<SecretProviderOptions, 'provider' | 'filePath'>> & SecretProviderOptions): string {
  switch (opts.provider) {
    case 'file':
      return `file:${opts.filePath}`;
    case 'hashicorp':
      return `hashicorp:${opts.address ?? ''}:${opts.mount ?? ''}`;
    default:
      return opts.provider;
  }
}

/**
 * Get the active secret provider (cached). Defaults to the file provider backed by
 * `.tagflow/vault.dev.json` so local development keeps working with zero config.
 * `TAGFLOW_VAULT_PROVIDER` overrides the configured provider.
 */
export function getSecretProvider(opts: SecretProviderOptions = {}): SecretProvider {
  const provider = process.env['TAGFLOW_VAULT_PROVIDER'] ?? opts.provider ?? 'file';
  const filePath = opts.filePath ?? `${process.cwd()}/.tagflow/vault.dev.json`;
  const key = cacheKey({ ...opts, provider, filePath });

  if (_activeProvider && _activeKey === key) {
    return _activeProvider;
  }

  switch (provider) {
    case 'dev':
      _activeProvider = new DevSecretProvider();
      break;
    case 'file':
      _activeProvider = new FileSecretProvider(filePath);
      break;
    case 'hashicorp':
      _activeProvider = new HashicorpVaultProvider({ address: opts.address, mount: opts.mount });
      break;
    default:
      throw new Error(`Unknown secret provider: ${provider}`);
  }

  _activeKey = key;
  return _activeProvider;
}

/** For testing only – resets the active provider so tests get a fresh one. */
export function _resetSecretProvider(): void {
  _activeProvider = null;
  _activeKey = null;
}
