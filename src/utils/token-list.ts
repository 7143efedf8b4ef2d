import { TOKEN_REG } from '../specs.js';

export interface TokenListResult {
  valid: boolean;
  tokens: string[];
  errors?: string[];
}

/**
 * Splits comma-separated list headers (Connection, Transfer-Encoding) into
 * lower-cased tokens, in order, across every occurrence of the header.
 * Parameters after `;` are dropped.
 */
export function parseTokenList(values: readonly string[]): TokenListResult {
  const tokens: string[] = [];
  const errors: string[] = [];

  for (const value of values) {
    for (const element of value.split(',')) {
      const token = (element.split(';')[0] ?? '').trim();
      if (!token) {
        continue;
      }
      if (!TOKEN_REG.test(token)) {
        errors.push(`Invalid token: "${token}"`);
        continue;
      }
      tokens.push(token.toLowerCase());
    }
  }

  const result: TokenListResult = {
    valid: errors.length === 0,
    tokens,
  };
  if (errors.length > 0) {
    result.errors = errors;
  }
  return result;
}

export function hasToken(tokens: readonly string[], token: string): boolean {
  return tokens.includes(token);
}
