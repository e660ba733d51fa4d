const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'privatekey',
  'private_key',
  'ciphertext',
  'auth_tag',
  'signature',
  'inputs'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
};

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  return state.extraSensitiveKeys.has(normalized) || DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const sanitizeValue = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'undefined':
      return value;
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
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
      message: value.message,
      ...('code' in value && typeof value.code === 'string' ? {code: value.code} : {}),
      ...(value.stack ? {stack: value.stack} : {})
    };
  }

  if (Buffer.isBuffer(value) || value instanceof Uint8Array) {
    return `[BYTES:${value.byteLength}]`;
  }

  if (state.seen.has(value)) {
    return '[CIRCULAR]';
  }
  state.seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => sanitizeValue(item, depth + 1, state));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entryValue]) => [
      key,
      isSensitiveKey(key, state) ? REDACTED_VALUE : sanitizeValue(entryValue, depth + 1, state)
    ])
  );
};

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

export const sanitizeRecordForLog = ({
  value,
  extraSensitiveKeys
}: {
  value: Record<string, unknown>;
  extraSensitiveKeys?: string[];
}): Record<string, unknown> => {
  const sanitized = sanitizeForLog({value, extraSensitiveKeys});
  return typeof sanitized === 'object' && sanitized !== null && !Array.isArray(sanitized)
    ? Object.fromEntries(Object.entries(sanitized))
    : {};
};
