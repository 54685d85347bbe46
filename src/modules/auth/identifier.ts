import { IdentifierType } from '../../utils/constants.js';

const MOBILE_REGEX = /^\+?1?\d{9,15}$/;
const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function classifyIdentifier(identifier: string): IdentifierType {
  return identifier.includes('@') ? IdentifierType.EMAIL : IdentifierType.MOBILE;
}

export function isValidMobile(mobile: string): boolean {
  return MOBILE_REGEX.test(mobile);
}

export function isValidEmail(email: string): boolean {
  return EMAIL_REGEX.test(email);
}

export interface Identifier {
  type: IdentifierType;
  value: string;
}

export type IdentifierResult =
  | { success: true; identifier: Identifier }
  | { success: false; error: string };

/**
 * Trim, classify and validate raw login input. E-mail addresses are
 * lower-cased so lookups don't depend on how the visitor typed them.
 */
export function parseIdentifier(raw: string): IdentifierResult {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { success: false, error: 'Please enter mobile number or email' };
  }

  const type = classifyIdentifier(trimmed);
  if (type === IdentifierType.EMAIL) {
    if (!isValidEmail(trimmed)) {
      return { success: false, error: 'Please enter a valid email address' };
    }
    return { success: true, identifier: { type, value: trimmed.toLowerCase() } };
  }

  if (!isValidMobile(trimmed)) {
    return { success: false, error: 'Please enter a valid mobile number' };
  }
  return { success: true, identifier: { type, value: trimmed } };
}
