/**
 * Domain-level ID creation.
 *
 * - Uses `crypto.randomUUID()` when available.
 * - Falls back to a reasonably unique string for older environments.
 */

let fallbackCounter = 0;

export type IdPrefix = 'item' | 'folder';

export function createId(prefix?: IdPrefix): string {
  const p = prefix ? `${prefix}_` : '';

  const maybeCrypto: Partial<Pick<Crypto, 'randomUUID'>> | undefined = globalThis.crypto;
  if (maybeCrypto?.randomUUID) {
    return `${p}${maybeCrypto.randomUUID()}`;
  }

  fallbackCounter = (fallbackCounter + 1) % 1_000_000;
  const now = Date.now().toString(36);
  const rand = Math.floor(Math.random() * 1e9).toString(36);
  const cnt = fallbackCounter.toString(36);
  return `${p}${now}_${rand}_${cnt}`;
}
