const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];
  const tokens: string[] = [];
  for (const word of words) {
    tokens.push(...expandTokenVariants(word));
  }
  return tokens;
}

/**
 * Cuts `text` to at most `maxChars`, preferring the last paragraph, line or
 * sentence break in the second half of the allowed span.
 */
export function truncateAtBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const window = text.slice(0, maxChars);
  const floor = Math.floor(maxChars * 0.5);
  for (const separator of ["\n\n", "\n", ". "]) {
    const idx = window.lastIndexOf(separator);
    if (idx >= floor) {
      return window.slice(0, idx + separator.trimEnd().length).trimEnd();
    }
  }
  return window.trimEnd();
}

function expandTokenVariants(token: string): string[] {
  const hasNonAscii = /[^\x00-\x7f]/.test(token);
  if (hasNonAscii) {
    return [token];
  }
  if (token.length < 2) {
    return [];
  }
  if (token.length >= 4 && token.endsWith("s") && !token.endsWith("ss")) {
    return [token, token.slice(0, -1)];
  }
  return [token];
}
