const KEYWORD_PATTERN = /[가-힣a-zA-Z0-9]{2,}/g;
const HANGUL_PATTERN = /[가-힣]{2,}/g;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with", "by",
  "이", "그", "저", "것", "수", "등", "및", "또는", "그리고", "하지만",
  "에서", "으로", "에게", "를", "을",
]);

/**
 * Lower-cased keyword candidates in order of appearance.
 * Duplicates are kept; callers decide whether to count them.
 */
export function extractKeywords(text: string | null | undefined): string[] {
  if (!text) return [];
  const tokens = text.toLowerCase().match(KEYWORD_PATTERN) ?? [];
  return tokens.filter((token) => !STOP_WORDS.has(token));
}

export function extractHangulTokens(text: string | null | undefined): string[] {
  if (!text) return [];
  return text.match(HANGUL_PATTERN) ?? [];
}
