import type { Confidence, TextSpan } from "@receipt-ledger/receipt-contracts";
import { absent, type ExtractionResult } from "./types.js";

export type RuleReading<T> = {
  value: T;
  span: TextSpan;
  confidence?: Confidence;
};

/**
 * One entry of an ordered extraction table. `read` turns a regex match into a
 * value, or rejects it (null) so the next match is considered.
 */
export type ExtractionRule<T> = {
  name: string;
  pattern: RegExp;
  confidence: Confidence;
  read: (match: RegExpExecArray, text: string) => RuleReading<T> | null;
};

type Candidate<T> = {
  start: number;
  reading: RuleReading<T>;
  confidence: Confidence;
};

/**
 * Evaluates every rule and keeps a single winner: the accepted match that
 * starts earliest in the text, with table order breaking ties at the same
 * position.
 */
export function runRules<T>(text: string, rules: ReadonlyArray<ExtractionRule<T>>): ExtractionResult<T> {
  if (text.length === 0) {
    return absent();
  }

  let winner: Candidate<T> | null = null;

  for (const rule of rules) {
    const candidate = firstAcceptedMatch(text, rule);
    if (candidate && (!winner || candidate.start < winner.start)) {
      winner = candidate;
    }
  }

  if (!winner) {
    return absent();
  }

  return {
    value: winner.reading.value,
    matchedSpan: winner.reading.span,
    confidence: winner.confidence,
  };
}

function firstAcceptedMatch<T>(
  text: string,
  rule: ExtractionRule<T>,
): Candidate<T> | null {
  const pattern = new RegExp(rule.pattern.source, withFlags(rule.pattern.flags, "gd"));
  let match = pattern.exec(text);

  while (match) {
    const reading = rule.read(match, text);
    if (reading) {
      return {
        start: match.index,
        reading,
        confidence: lowest(rule.confidence, reading.confidence ?? "high"),
      };
    }
    // rejected matches may overlap a later valid one
    pattern.lastIndex = match.index + 1;
    match = pattern.exec(text);
  }

  return null;
}

/** Offsets of a capture group; requires the `d` flag, which runRules adds. */
export function groupSpan(match: RegExpExecArray, group: string): TextSpan | null {
  const range = match.indices?.groups?.[group];
  return range ? { start: range[0], end: range[1] } : null;
}

export function matchSpan(match: RegExpExecArray): TextSpan {
  return { start: match.index, end: match.index + match[0].length };
}

export function lowest(a: Confidence, b: Confidence): Confidence {
  return a === "low" || b === "low" ? "low" : "high";
}

function withFlags(flags: string, extra: string): string {
  let merged = flags;
  for (const flag of extra) {
    if (!merged.includes(flag)) {
      merged += flag;
    }
  }
  return merged;
}
