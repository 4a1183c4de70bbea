import type { TextSpan } from "@receipt-ledger/receipt-contracts";
import { MONTH_NAME_SOURCE } from "../locale-date.js";
import { groupSpan, runRules, type ExtractionRule } from "../rule-runner.js";
import { splitLines } from "../text-normalizer.js";
import { WORD_END, WORD_START } from "../text-patterns.js";
import { absent, type ExtractionResult } from "../types.js";

export const DESCRIPTION_PLACEHOLDER = "Receipt transaction";
const MAX_DESCRIPTION_LENGTH = 200;

const LABELED_DESCRIPTION: ExtractionRule<string> = {
  name: "labeled-description",
  pattern: new RegExp(
    `${WORD_START}(?:detalle|descripci[oó]n|concepto|motivo|asunto|description|memo)${WORD_END} ?: ?(?<text>[^\\n]+)`,
    "iu",
  ),
  confidence: "high",
  read: (match) => {
    const value = cap(cleanSegment(match.groups?.text ?? ""));
    const span = groupSpan(match, "text");
    // one- or two-letter values are usually a stray code, not a description
    return value.length > 3 && span ? { value, span } : null;
  },
};

const ANCHOR = new RegExp(
  [
    "(?:US\\$|U\\$S|\\$|ARS|USD) ?[-+]?\\d",
    "\\d{1,2}[/.-]\\d{1,2}[/.-]\\d{2,4}",
    "\\d{4}-\\d{1,2}-\\d{1,2}",
    `\\d{1,2} (?:de )?(?:${MONTH_NAME_SOURCE})${WORD_END}`,
  ].join("|"),
  "iu",
);
const LABEL_SEGMENT = /^[\p{L}][\p{L}\p{N}°º#. ]{0,40}:/u;
const SENTENCE_BREAK = /[.!?] (?=\p{Lu})/gu;

type Segment = {
  text: string;
  span: TextSpan;
  anchored: boolean;
  label: boolean;
};

/**
 * Labeled detail first; then the longest sentence that carries or sits next to
 * the amount/date block; then the first non-empty line with low confidence.
 * Returns absent only for empty text, the assembler supplies the placeholder.
 */
export function extractDescription(normalizedText: string): ExtractionResult<string> {
  if (normalizedText.length === 0) {
    return absent();
  }

  const labeled = runRules(normalizedText, [LABELED_DESCRIPTION]);
  if (labeled.value) {
    return labeled;
  }

  const segments = segmentText(normalizedText);
  const adjacent = pickAdjacentSegment(segments);
  if (adjacent) {
    return { value: cap(adjacent.text), matchedSpan: adjacent.span, confidence: "high" };
  }

  const firstLine = splitLines(normalizedText).find((line) => line.text.length > 0);
  if (!firstLine) {
    return absent();
  }
  const value = cap(cleanSegment(firstLine.text));
  if (value.length === 0) {
    return absent();
  }
  return {
    value,
    matchedSpan: { start: firstLine.start, end: firstLine.start + firstLine.text.length },
    confidence: "low",
  };
}

function segmentText(normalizedText: string): Segment[] {
  const segments: Segment[] = [];

  for (const line of splitLines(normalizedText)) {
    if (line.text.length === 0) {
      continue;
    }

    let pieceStart = 0;
    const breaks = [...line.text.matchAll(SENTENCE_BREAK)];
    const boundaries = breaks.map((found) => (found.index ?? 0) + 1);
    boundaries.push(line.text.length);

    for (const boundary of boundaries) {
      const raw = line.text.slice(pieceStart, boundary);
      const start = line.start + pieceStart;
      pieceStart = boundary + 1;

      const text = cleanSegment(raw);
      if (!/\p{L}/u.test(text)) {
        continue;
      }
      segments.push({
        text,
        span: { start, end: start + text.length },
        anchored: ANCHOR.test(text),
        label: LABEL_SEGMENT.test(text),
      });
    }
  }

  return segments;
}

function pickAdjacentSegment(segments: Segment[]): Segment | null {
  let best: Segment | null = null;

  for (const [index, segment] of segments.entries()) {
    if (segment.label) {
      continue;
    }
    const neighbourAnchored =
      segments[index - 1]?.anchored === true || segments[index + 1]?.anchored === true;
    if (!segment.anchored && !neighbourAnchored) {
      continue;
    }
    if (!best || segment.text.length > best.text.length) {
      best = segment;
    }
  }

  return best;
}

function cleanSegment(value: string): string {
  return value.trim().replace(/[\s.,;:]+$/u, "");
}

function cap(value: string): string {
  return value.length > MAX_DESCRIPTION_LENGTH ? value.slice(0, MAX_DESCRIPTION_LENGTH).trim() : value;
}
