/**
 * Redaction helpers for values that end up in logs: API keys from the
 * configuration and e-mail addresses that appear in questions or author lines.
 */

const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "cohereapikey",
  "groqapikey",
  "qdrantapikey",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair: the whole value for a sensitive key,
 * otherwise only the e-mail addresses inside a string value.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Single-line, length-capped and redacted preview of free text, for log lines
 * that should show what a question or answer was about without its full body.
 */
export function previewText(text: string, maxChars = 120): string {
  const flat = text.replace(/\s+/g, " ").trim();
  const redacted = flat.replace(EMAIL_REGEX, REDACTED);
  return redacted.length > maxChars ? `${redacted.slice(0, maxChars)}...` : redacted;
}

/** Pino `redact` paths: top level and one level of nesting. */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "cohereApiKey",
  "groqApiKey",
  "qdrantApiKey",
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
  "*.cohereApiKey",
  "*.groqApiKey",
  "*.qdrantApiKey",
];
