/** Letter/digit-aware word edges; `\b` is ASCII-only and breaks on accented letters. */
export const WORD_START = "(?<![\\p{L}\\p{N}])";
export const WORD_END = "(?![\\p{L}\\p{N}])";

const ACCENT_CLASSES: Record<string, string> = {
  a: "[aáà]",
  e: "[eéè]",
  i: "[iíì]",
  o: "[oóò]",
  u: "[uúüù]",
  n: "[nñ]",
};

/**
 * Regex source for a keyword that tolerates missing or extra Spanish accents
 * ("deposito" matches "depósito" and the other way round). Use with the `iu` flags.
 */
export function keywordSource(keyword: string): string {
  const folded = foldAccents(keyword.trim().toLowerCase());
  let source = "";
  for (const char of folded) {
    if (char === " ") {
      source += " +";
      continue;
    }
    source += ACCENT_CLASSES[char] ?? escapeRegExp(char);
  }
  return source;
}

export function keywordAlternation(keywords: readonly string[]): string {
  return [...keywords]
    .sort((a, b) => b.length - a.length)
    .map(keywordSource)
    .join("|");
}

export function foldAccents(value: string): string {
  return value.normalize("NFD").replace(/[\u0300-\u036f]/g, "").normalize("NFC");
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
