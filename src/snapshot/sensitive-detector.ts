/**
 * Credential / secret indicators. A match is a hint for manual review, not a
 * verdict; false positives are expected.
 */
export const SENSITIVE_TERMS = [
  'password',
  'passwd',
  'pwd',
  'aws_access_key_id',
  'aws_secret_access_key',
  'private key',
  'BEGIN PRIVATE KEY',
  'api_key',
  'access_token',
] as const;

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const SENSITIVE_PATTERN = new RegExp(`(${SENSITIVE_TERMS.map(escapeRegExp).join('|')})`, 'i');

export function containsSensitive(text: string | null | undefined): boolean {
  if (!text) return false;
  return SENSITIVE_PATTERN.test(text);
}

/** First indicator found in `text`, for log context */
export function findSensitiveTerm(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = SENSITIVE_PATTERN.exec(text);
  return match ? match[1] ?? match[0] : null;
}
