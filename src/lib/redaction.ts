const REDACTED = '[REDACTED]';

const SENSITIVE_KEY_PARTS = [
  'authorization',
  'apikey',
  'secret',
  'password',
  'token',
  'cookie',
  'dob',
  'birthdate',
  'patient',
  'firstname',
  'lastname',
  'legalname',
  'fullname',
  'email',
  'phone',
  'address',
  'transcript',
  'summary',
  'signaltext',
  'callsid',
  'accountsid',
  'payload'
];

const normalizeKey = (key: string) => key.toLowerCase().replace(/[^a-z0-9]/g, '');

export function isSensitiveKey(key: string): boolean {
  const normalized = normalizeKey(key);
  return SENSITIVE_KEY_PARTS.some((part) => normalized.includes(part));
}

const redactRecursive = (value: unknown, seen: WeakSet<object>): unknown => {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (seen.has(value)) {
    return REDACTED;
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, seen));
  }

  const out: Record<string, unknown> = {};
  for (const [key, childValue] of Object.entries(value)) {
    out[key] = isSensitiveKey(key) ? REDACTED : redactRecursive(childValue, seen);
  }
  return out;
};

/**
 * Copies a log payload with PHI and credential-bearing keys masked, matching
 * keys by substring after stripping case and punctuation.
 */
export function redactSensitive(value: unknown): unknown {
  return redactRecursive(value, new WeakSet<object>());
}
