import germanStopwords from './data/german-stopwords.json' with { type: 'json' };

const STOPWORDS: ReadonlySet<string> = new Set(germanStopwords);

const TOKEN_PATTERN = /§\d+[a-z]?|[\p{L}\p{N}]+/gu;

/**
 * Splits text into index terms. Shared by indexing and querying so both sides agree.
 *
 * Section references are folded into single terms (`§ 12` and `§12` become `§12`,
 * `Art. 3` becomes `art3`), so an exact citation in a question matches exactly.
 */
export function tokenize(text: string): string[] {
  const folded = text
    .toLowerCase()
    .replace(/§+\s*(\d+[a-z]?)\b/g, '§$1')
    .replace(/\bart(?:ikel|\.)\s*(\d+[a-z]?)\b/g, 'art$1');

  const tokens = folded.match(TOKEN_PATTERN) ?? [];
  return tokens.filter((token) => !STOPWORDS.has(token) && (token.length > 1 || /\d/.test(token)));
}
