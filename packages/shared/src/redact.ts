/**
 * Secret Redaction
 *
 * Scrubs API keys out of text before it reaches a log line or an error
 * envelope. Known secrets are registered once at startup; key-shaped tokens
 * are caught by pattern even when they were never registered.
 */

const REDACTED = '[REDACTED]';

const SECRET_PATTERNS: RegExp[] = [
  /\bsk-[A-Za-z0-9_*-]{8,}/g,
  /\bBearer\s+[A-Za-z0-9._~+/=-]+/gi,
];

const registeredSecrets = new Set<string>();

export function registerSecrets(secrets: Iterable<string>): void {
  for (const secret of secrets) {
    if (secret.length > 0) {
      registeredSecrets.add(secret);
    }
  }
}

export function clearRegisteredSecrets(): void {
  registeredSecrets.clear();
}

export function redactSecrets(text: string, secrets: Iterable<string> = registeredSecrets): string {
  let result = text;

  for (const secret of secrets) {
    if (secret.length > 0) {
      result = result.split(secret).join(REDACTED);
    }
  }

  for (const pattern of SECRET_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }

  return result;
}
