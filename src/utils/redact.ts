/**
 * Redaction Utility
 *
 * Helpers to strip sensitive values from logs and audit rows.
 * Never log Authorization headers, Stripe keys (sk_*, whsec_*), emails or
 * customer contact details in clear text.
 */

const CONTACT_KEYS = new Set(['phone', 'address', 'shipping', 'shipping_details']);

/**
 * Redact email addresses, preserving domain for debugging
 * Example: "user@example.com" → "***@example.com"
 */
export function redactEmail(email: string): string {
  const parts = email.split('@');
  if (parts.length !== 2) return '***';

  return `***@${parts[1]}`;
}

/**
 * Example: "Bearer abc123..." → "Bearer ***"
 */
export function redactAuthHeader(auth: string): string {
  const lower = auth.toLowerCase();
  if (lower.startsWith('bearer ')) return 'Bearer ***';
  if (lower.startsWith('basic ')) return 'Basic ***';
  return '***';
}

export function redactSecret(value: string): string {
  if (value.startsWith('sk_')) return 'sk_***';
  if (value.startsWith('whsec_')) return 'whsec_***';
  return '***';
}

/**
 * Replace sk_*, whsec_*, emails and bearer/basic credentials inside free text
 */
export function redactString(input: string): string {
  return input
    .replace(/sk_(test|live)_[a-zA-Z0-9]+/g, 'sk_***')
    .replace(/whsec_[a-zA-Z0-9]+/g, 'whsec_***')
    .replace(/\b[a-zA-Z0-9._%+-]+@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g, '***@$1')
    .replace(/Bearer\s+[a-zA-Z0-9_\-.]+/gi, 'Bearer ***')
    .replace(/Basic\s+[a-zA-Z0-9_\-.=]+/gi, 'Basic ***');
}

function redactEntry(key: string, value: unknown): unknown {
  const lowerKey = key.toLowerCase();

  if (value === null || value === undefined) {
    return value;
  }

  if (lowerKey === 'authorization' && typeof value === 'string') {
    return redactAuthHeader(value);
  }

  if (lowerKey.includes('email')) {
    return typeof value === 'string' ? redactEmail(value) : '***';
  }

  if (lowerKey.includes('apikey') || lowerKey.includes('api_key') || lowerKey.includes('secret')) {
    return typeof value === 'string' ? redactSecret(value) : '***';
  }

  if (CONTACT_KEYS.has(lowerKey)) {
    return '***';
  }

  return redactValue(value);
}

/**
 * Deep copy of `value` with sensitive fields masked
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }

  if (Array.isArray(value)) {
    return value.map(redactValue);
  }

  if (value !== null && typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = redactEntry(key, entry);
    }
    return redacted;
  }

  return value;
}
