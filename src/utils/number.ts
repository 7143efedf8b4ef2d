export function parseInteger(string_: string | number): number | null {
  const value = typeof string_ === 'string' ? parseInt(string_, 10) : string_;

  if (
    !Number.isInteger(value) ||
    value < 0 ||
    Number.isNaN(value) ||
    `${string_}` !== `${value}`
  ) {
    return null;
  }
  return value;
}

const LEADING_ZEROS_REG = /^0+(?=\d)/;
const DIGITS_REG = /^\d+$/;

/**
 * Parses a decimal length as sent in Content-Length. Leading zeros are
 * allowed; values beyond `Number.MAX_SAFE_INTEGER` are rejected.
 */
export function parseDecimalLength(string_: string): number | null {
  if (!DIGITS_REG.test(string_)) {
    return null;
  }
  const value = parseInteger(string_.replace(LEADING_ZEROS_REG, ''));
  if (value === null || !Number.isSafeInteger(value)) {
    return null;
  }
  return value;
}
