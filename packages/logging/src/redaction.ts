const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'apikey',
  'api_key',
  'privatekey',
  'private_key'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({key, extraSensitiveKeys}: {key: string; extraSensitiveKeys: Set<string>}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const describeError = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...('code' in error && typeof error.code === 'string' ? {code: error.code} : {}),
  ...(error.stack ? {stack: error.stack} : {})
});

const sanitizeValue = ({
  value,
  depth,
  seen,
  extraSensitiveKeys
}: {
  value: unknown;
  depth: number;
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
      break;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return describeError(value);
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue({value: item, depth: depth + 1, seen, extraSensitiveKeys}));
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      return '[CIRCULAR]';
    }
    seen.add(value);

    return Object.fromEntries(
      Object.entries(value).map(([key, entryValue]) =>
        isSensitiveKey({key, extraSensitiveKeys})
          ? [key, REDACTED_VALUE]
          : [key, sanitizeValue({value: entryValue, depth: depth + 1, seen, extraSensitiveKeys})]
      )
    );
  }

  return Object.prototype.toString.call(value);
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeValue({
    value,
    depth: 0,
    seen: new WeakSet<object>(),
    extraSensitiveKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(item => item.length > 0))
  });

export const sanitizeMetadataForLog = ({
  metadata,
  extraSensitiveKeys
}: {
  metadata: Record<string, unknown>;
  extraSensitiveKeys?: string[];
}): Record<string, unknown> => {
  const sanitized = sanitizeForLog({value: metadata, extraSensitiveKeys});
  return typeof sanitized === 'object' && sanitized !== null && !Array.isArray(sanitized)
    ? Object.fromEntries(Object.entries(sanitized))
    : {};
};
