const DECIMAL_PATTERN = /^(\d+\.?\d*|\.\d+)$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const PERSIAN_ZERO = 0x06f0;
const ARABIC_INDIC_ZERO = 0x0660;

/**
 * Map Persian (۰-۹) and Arabic-Indic (٠-٩) digits to ASCII, leaving
 * everything else alone.
 */
export function toAsciiDigits(input: string): string {
  return input.replace(/[۰-۹٠-٩]/g, (digit) => {
    const code = digit.charCodeAt(0);
    return String(code - (code >= PERSIAN_ZERO ? PERSIAN_ZERO : ARABIC_INDIC_ZERO));
  });
}

/**
 * Parse a user-typed Toman amount. Thousands separators are allowed
 * ("50,000"), as are Persian digits; anything else non-numeric is rejected.
 * Returns null when the input is not a positive amount.
 */
export function parseAmount(input: string): number | null {
  const cleaned = toAsciiDigits(input).replace(/,/g, "").trim();
  if (!DECIMAL_PATTERN.test(cleaned)) return null;

  const amount = Number(cleaned);
  if (!Number.isFinite(amount) || amount <= 0) {
    return null;
  }
  return amount;
}

/**
 * Parse a transaction id argument ("/del_tr 12").
 */
export function parseRecordId(input: string): number | null {
  const cleaned = toAsciiDigits(input).trim();
  if (!INTEGER_PATTERN.test(cleaned)) return null;

  const id = Number(cleaned);
  return Number.isSafeInteger(id) ? id : null;
}
