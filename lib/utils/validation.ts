/**
 * Input validation utilities
 * Simple email format validation (any password is accepted)
 */

const MAX_EMAIL_LENGTH = 254; // RFC 5321 limit

/**
 * Basic email format validation
 * Simple regex check - allows most common email formats
 */
export function isValidEmail(email: string): boolean {
  if (!email) {
    return false;
  }

  // More permissive than RFC 5322, inner whitespace is rejected
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

  return emailRegex.test(email.trim());
}

/**
 * Validate email and return error message if invalid
 */
export function validateEmail(email: string): { valid: boolean; error?: string } {
  const trimmed = email.trim();

  if (trimmed.length === 0) {
    return { valid: false, error: 'Email is required' };
  }

  if (trimmed.length > MAX_EMAIL_LENGTH) {
    return { valid: false, error: 'Email is too long' };
  }

  if (!isValidEmail(trimmed)) {
    return { valid: false, error: 'Invalid email format' };
  }

  return { valid: true };
}

/**
 * Trim and lowercase the domain. The local part keeps its case.
 */
export function normalizeEmail(email: string): string {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf('@');
  if (at === -1) {
    return trimmed;
  }
  return trimmed.slice(0, at) + trimmed.slice(at).toLowerCase();
}
