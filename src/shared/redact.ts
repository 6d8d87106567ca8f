// Credential shapes that may end up in error messages from feeds and stores.
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /x-api-key:\s*\S+/gi,
  /password['":=\s]+['"]?\S+['"]?/gi,
  /api_key['":=\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
];

// user:password@ in connection strings; the scheme and host stay readable.
const URL_CREDENTIALS_RE = /(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+:[^/\s@]+@/gi;

const SECRET_KEY_RE = /^(token|secret|password|api_key|authorization|x-api-key|dsn)$/i;

/** Redact credential-looking substrings from a log message. */
export function redact(input: string): string {
  let output = input.replace(URL_CREDENTIALS_RE, '$1[REDACTED]@');
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * JSON.stringify for log lines: values under secret-named keys are replaced
 * and cycles become "[Circular]".
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key: string, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && SECRET_KEY_RE.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
