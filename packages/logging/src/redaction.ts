// Request headers and TLS material: authorization, cookie, passphrase, private_key, key_pem ...
const SENSITIVE_KEY = /authorization|cookie|password|passphrase|secret|token|private_?key|key_pem/u;

const REDACTED_VALUE = '[REDACTED]';

const isSensitiveKey = (key: string) => SENSITIVE_KEY.test(key.toLowerCase().replace(/[^a-z0-9_]/gu, ''));

/**
 * Makes log metadata safe to serialize: credential fields are masked, byte buffers (configuration
 * parts, certificates) are reduced to their length and errors to name and message.
 */
export const sanitizeForLog = (value: unknown, seen = new WeakSet<object>()): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (value instanceof Uint8Array) {
    return `[BYTES:${value.byteLength}]`;
  }

  if (value instanceof Error) {
    return {name: value.name, message: value.message};
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (seen.has(value)) {
    return '[CIRCULAR]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => sanitizeForLog(item, seen));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, isSensitiveKey(key) ? REDACTED_VALUE : sanitizeForLog(entry, seen)])
  );
};
