const NAME_TOKEN_PATTERN = /^\p{Lu}\p{L}*$/u;

/**
 * Accepts either a single capitalized alphabetic token or a reply whose first two
 * tokens are capitalized alphabetic words. Anything after the second token is dropped.
 */
export function extractName(text: string): string | null {
  const tokens = text.trim().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return null;
  }

  if (tokens.length === 1) {
    return isNameToken(tokens[0]) ? tokens[0] : null;
  }

  const [first, second] = tokens;
  if (!isNameToken(first) || !isNameToken(second)) {
    return null;
  }
  return `${first} ${second}`;
}

function isNameToken(token: string): boolean {
  return NAME_TOKEN_PATTERN.test(token);
}
