const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'password',
  'authorization',
  'privatekey',
  'private_key',
  'privkey'
] as const;

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

// Key material can reach a log inside free text: engine output, journal lines, env assignments, argv.
const SECRET_TEXT_PATTERNS: readonly RegExp[] = [
  /(PrivateKey:\s*)[A-Za-z0-9_-]{43}/gu,
  /(Private key:\s*)[A-Za-z0-9_-]{43}/gu,
  /(PRIVKEY=['"]?)[A-Za-z0-9_-]{43}/gu,
  /("privateKey"\s*:\s*")[A-Za-z0-9_-]{43}/gu,
  /(x25519 -i\s+)[A-Za-z0-9_-]{43}/gu
];

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

export const redactSecretsInText = (text: string) =>
  SECRET_TEXT_PATTERNS.reduce((current, pattern) => current.replace(pattern, `$1${REDACTED}`), text);

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: ReadonlySet<string>;
};

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  return (
    state.extraSensitiveKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment))
  );
};

const sanitizeValue = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_DEPTH) {
    return '[TRUNCATED]';
  }

  switch (typeof value) {
    case 'string':
      return redactSecretsInText(value);
    case 'number':
    case 'boolean':
    case 'bigint':
    case 'undefined':
      return value;
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    case 'object':
      break;
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactSecretsInText(value.message),
      ...(value.stack ? {stack: redactSecretsInText(value.stack)} : {})
    };
  }
  if (Array.isArray(value)) {
    // argv arrays carry a private key as the element after `-i`.
    return value.map((item, index) =>
      index > 0 && value[index - 1] === '-i' && typeof item === 'string' ? REDACTED : sanitizeValue(item, depth + 1, state)
    );
  }

  if (state.seen.has(value)) {
    return '[CIRCULAR]';
  }
  state.seen.add(value);

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = isSensitiveKey(key, state) ? REDACTED : sanitizeValue(entry, depth + 1, state);
  }
  return sanitized;
};

/**
 * Deep copy of `value` safe to serialize: sensitive keys are masked, key
 * material is scrubbed from strings, cycles and very deep nesting are cut.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeValue(value, 0, {
    seen: new WeakSet<object>(),
    extraSensitiveKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0))
  });
