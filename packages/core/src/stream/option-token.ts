const NEGATIVE_NUMBER = /^-(\d+\.?\d*|\.\d+)$/;

/**
 * Whether a token is written as an option: a leading dash, at least one
 * more character, and not a negative number such as `-5` or `-0.5`.
 */
export function isOptionToken(token: string): boolean {
  return token.length > 1 && token.startsWith("-") && !NEGATIVE_NUMBER.test(token);
}
