import crypto from 'crypto';

const DIGITS = '0123456789';
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function randomString(alphabet: string, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[crypto.randomInt(alphabet.length)];
  }
  return out;
}

/**
 * Generate a numeric OTP of specified length.
 */
export function generateOtp(length = 6): string {
  return randomString(DIGITS, length);
}

/**
 * Credential for accounts created by the OTP flow. Never shown to anyone;
 * it only fills the password column.
 */
export function generatePlaceholderPassword(length = 12): string {
  return randomString(ALPHANUMERIC, length);
}

/**
 * Opaque session token stored on the Session row and carried in the access JWT.
 */
export function generateSessionKey(): string {
  return crypto.randomBytes(32).toString('hex');
}

/**
 * Mask an identifier for logs: "+15551234567" -> "+155*****567", "ann@x.io" -> "a**@x.io"
 */
export function maskIdentifier(identifier: string): string {
  const at = identifier.indexOf('@');
  if (at > 0) {
    const local = identifier.slice(0, at);
    return `${local[0]}${'*'.repeat(Math.max(local.length - 1, 1))}${identifier.slice(at)}`;
  }
  if (identifier.length <= 6) return '*'.repeat(identifier.length);
  return `${identifier.slice(0, 4)}${'*'.repeat(identifier.length - 7)}${identifier.slice(-3)}`;
}
