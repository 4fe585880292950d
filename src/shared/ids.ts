import { randomBytes } from 'node:crypto';

/**
 * Sortable run ID: UTC timestamp followed by 6 random bytes in base64url,
 * e.g. `20261019T083015Z-q3Zt0b9K`.
 */
export function generateId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `${stamp}-${randomBytes(6).toString('base64url')}`;
}
