import { redact, registerSecretValues } from '../shared/redact.js';
import { SecretFetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SecretBundle, SecretProvider } from '../vault/types.js';
import type { SecretScope } from './types.js';

/**
 * Acquire every declared secret, run `fn` with them, then release: the bundles
 * are emptied and their values stop being masked, on success and on failure.
 * A fetch failure rejects with SecretFetchError before `fn` is called.
 */
export async function withSecretScope<T>(
  provider: SecretProvider,
  paths: readonly string[],
  fn: (scope: SecretScope) => Promise<T>,
): Promise<T> {
  const held = new Map<string, Record<string, string>>();
  const releases: Array<() => void> = [];

  try {
    for (const path of new Set(paths)) {
      let bundle: SecretBundle;
      try {
        bundle = await provider.getSecretBundle(path);
      } catch (err) {
        if (err instanceof SecretFetchError) throw err;
        throw new SecretFetchError(path, errorMessage(err), { cause: err });
      }
      const copy = { ...bundle };
      releases.push(registerSecretValues(Object.values(copy)));
      held.set(path, copy);
      logger.debug('Secret acquired', { path, fields: Object.keys(copy) });
    }

    const scope: SecretScope = {
      get(path: string): SecretBundle {
        const bundle = held.get(path);
        if (!bundle) {
          throw new SecretFetchError(path, 'not declared by this stage');
        }
        return bundle;
      },
    };

    return await fn(scope);
  } catch (err) {
    // The message is reported after release, when these values are no longer masked.
    if (err instanceof Error) err.message = redact(err.message);
    throw err;
  } finally {
    for (const [path, bundle] of held) {
      for (const field of Object.keys(bundle)) bundle[field] = '';
      logger.debug('Secret released', { path });
    }
    held.clear();
    releases.forEach((release) => release());
  }
}

/** Read one field from a bundle, failing as a secret-fetch problem when absent. */
export function requireField(bundle: SecretBundle, path: string, field: string): string {
  const value = bundle[field];
  if (!value) {
    throw new SecretFetchError(path, `field "${field}" is missing`);
  }
  return value;
}
