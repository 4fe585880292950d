// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+(\s+\S+)?/gi,
  /x-vault-token:\s*\S+/gi,
  /token['":\s=]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /password['":\s=]+['"]?\S+['"]?/gi,
  /https?:\/\/[^/\s:@]+:[^/\s@]+@/gi,
];

const MASK = '[REDACTED]';

// Values currently held by live secret bundles, masked wherever they appear.
const activeSecretValues = new Map<string, number>();

/**
 * Register literal secret values for masking. Returns a release function that
 * must be called when the owning scope ends; values registered by several
 * scopes stay masked until the last one releases them.
 */
export function registerSecretValues(values: Iterable<string>): () => void {
  const registered: string[] = [];
  for (const value of values) {
    // Very short values would mask ordinary words in log lines.
    if (value.length < 4) continue;
    activeSecretValues.set(value, (activeSecretValues.get(value) ?? 0) + 1);
    registered.push(value);
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    for (const value of registered) {
      const count = (activeSecretValues.get(value) ?? 1) - 1;
      if (count <= 0) activeSecretValues.delete(value);
      else activeSecretValues.set(value, count);
    }
  };
}

/** For testing only – number of distinct values currently masked. */
export function activeSecretCount(): number {
  return activeSecretValues.size;
}

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  // Longest first so a value containing another is masked whole.
  const values = [...activeSecretValues.keys()].sort((a, b) => b.length - a.length);
  for (const value of values) {
    output = output.split(value).join(MASK);
  }
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, MASK);
  }
  return output;
}
