import crypto from 'crypto';

const DEMO_TOKEN_LENGTH = 32;

/** Lowercase hex SHA-256 of the UTF-8 bytes of `value`. */
export function digest(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

// Unsalted: password_hash holds exactly this digest.
export function hashPassword(password: string): string {
  return digest(password);
}

export function verifyPassword(password: string, passwordHash: string): boolean {
  const candidate = Buffer.from(hashPassword(password), 'utf8');
  const stored = Buffer.from(passwordHash, 'utf8');
  return candidate.length === stored.length && crypto.timingSafeEqual(candidate, stored);
}

/** Display-only token derived from the email. It authorizes nothing. */
export function demoToken(email: string): string {
  return digest(email).slice(0, DEMO_TOKEN_LENGTH);
}
