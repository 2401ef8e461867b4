const REDACTED = '***';

function shouldRedactKey(key: string): boolean {
  const k = key.toLowerCase();

  return (
    k.includes('password') ||
    k.includes('secret') ||
    k.includes('token') ||
    k.includes('cookie') ||
    k === 'authorization'
  );
}

export function redactJsonSecrets(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => redactJsonSecrets(v));
  if (!input || typeof input !== 'object') return input;

  const obj = input as Record<string, unknown>;
  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    out[key] = shouldRedactKey(key) ? REDACTED : redactJsonSecrets(value);
  }

  return out;
}

/**
 * Masks `<password>` element text inside a SOAP payload, for excerpts.
 */
export function redactSoapCredentials(xml: string): string {
  return xml.replace(/<((?:[\w-]+:)?password)>[\s\S]*?<\/\1>/gi, `<$1>${REDACTED}</$1>`);
}
