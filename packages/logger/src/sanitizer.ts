/**
 * @hoist/logger - Sensitive Data Sanitizer
 * Masks secrets that end up inside logged command lines
 */

export const SENSITIVE_KEYS = [
  'password',
  'passwd',
  'apikey',
  'api_key',
  'secret',
  'token',
  'authorization',
  'database_url',
  'redis_url',
  'private_key',
] as const;

// KEY=VALUE where VALUE runs to the next whitespace or closing quote
const ASSIGNMENT = /\b([A-Za-z_][A-Za-z0-9_-]*)=([^\s"']+)/g;

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(k => lowerKey.includes(k));
}

/**
 * Partially reveals long values (first 4 and last 4 chars).
 */
export function maskValue(value: string): string {
  return value.length > 8 ? `${value.slice(0, 4)}****${value.slice(-4)}` : '****';
}

/**
 * Mask the value of every `KEY=VALUE` token whose key looks sensitive,
 * e.g. `--build-arg NPM_TOKEN=...`.
 */
export function maskSecrets(text: string): string {
  return text.replace(ASSIGNMENT, (match, key: string, value: string) =>
    isSensitiveKey(key) ? `${key}=${maskValue(value)}` : match,
  );
}
