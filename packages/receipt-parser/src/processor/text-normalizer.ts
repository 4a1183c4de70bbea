const LINE_BREAKS = /\r\n|[\r\u2028\u2029\f\v]/g;
const CONTROL_CHARS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g;
const INVISIBLE_CHARS = /[\u00AD\u200B-\u200F\u202A-\u202E\u2060-\u2069\uFEFF]/g;
const HORIZONTAL_WHITESPACE = /[^\S\n]+/g;

const PUNCTUATION_MAP: Array<[RegExp, string]> = [
  [/[\u2010-\u2015\u2212]/g, "-"],
  [/[\u2018\u2019\u201A\u2032]/g, "'"],
  [/[\u201C\u201D\u201E\u2033\u00AB\u00BB]/g, '"'],
  [/\uFF04/g, "$"],
  [/\u2026/g, "..."],
];

/**
 * Canonical form every field extractor runs against.
 *
 * Line boundaries are kept (lines are trimmed, never merged) so extractors can
 * reason about labels and neighbouring lines. Whitespace-only input collapses
 * to the empty string.
 */
export function normalizeReceiptText(raw: string): string {
  if (raw.length === 0) {
    return "";
  }

  let text = raw
    .replace(LINE_BREAKS, "\n")
    .normalize("NFC")
    .replace(CONTROL_CHARS, "")
    .replace(INVISIBLE_CHARS, "");

  for (const [pattern, replacement] of PUNCTUATION_MAP) {
    text = text.replace(pattern, replacement);
  }

  const normalized = text
    .split("\n")
    .map((line) => line.replace(HORIZONTAL_WHITESPACE, " ").trim())
    .join("\n");

  return normalized.trim().length === 0 ? "" : normalized;
}

export type TextLine = {
  text: string;
  start: number;
};

export function splitLines(normalizedText: string): TextLine[] {
  const lines: TextLine[] = [];
  let offset = 0;
  for (const line of normalizedText.split("\n")) {
    lines.push({ text: line, start: offset });
    offset += line.length + 1;
  }
  return lines;
}
