const SPACE_BEFORE_PUNCTUATION_RE = /\s+([,.;:!?])/g;

/** Joins OCR tokens with single spaces and pulls stray " ," / " ." back onto the word. */
export function joinTokens(tokens: readonly string[]): string {
  return normalizePunctuationSpacing(tokens.join(' '));
}

export function normalizePunctuationSpacing(text: string): string {
  return text.replace(SPACE_BEFORE_PUNCTUATION_RE, '$1');
}
