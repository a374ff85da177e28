/**
 * Validation utilities shared by the webhook, the conversation flow and the
 * reviewer API.
 */

const TICKET_NUMBER_REGEX = /^TKT-\d{4}-\d{5,}$/;
const TICKET_NUMBER_IN_TEXT_REGEX = /TKT-\d{4}-\d{5,}/i;

/**
 * Validate phone number format
 * Accepts: +1234567890 (10-15 digits after +)
 */
export function isValidPhone(phone: string): boolean {
  return /^\+\d{10,15}$/.test(phone);
}

/**
 * Normalize a phone number to E.164 (`+` followed by digits).
 * WhatsApp delivers `from` without the leading `+`.
 * Returns null when the digit count is outside 10-15.
 */
export function normalizePhone(input: string): string | null {
  const digits = input.replace(/\D/g, '');

  if (digits.length < 10 || digits.length > 15) {
    return null;
  }

  return '+' + digits;
}

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = 2000): string {
  const cleaned = input
    // Remove control characters except newlines
    .replace(/[\x00-\x09\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim();

  // Count code points so a surrogate pair (emoji) is never split
  const codePoints = Array.from(cleaned);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('').trimEnd() : cleaned;
}

export function isValidTicketNumber(value: string): boolean {
  return TICKET_NUMBER_REGEX.test(value);
}

/**
 * Find a ticket reference such as "TKT-2024-00123" anywhere in a message.
 */
export function extractTicketNumber(message: string): string | null {
  const match = TICKET_NUMBER_IN_TEXT_REGEX.exec(message);
  return match ? match[0].toUpperCase() : null;
}
