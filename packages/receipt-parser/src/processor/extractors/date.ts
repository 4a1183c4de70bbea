import {
  MONTH_NAME_SOURCE,
  monthFromName,
  parseYearToken,
  parseLocaleDate,
  type LocalDateParts,
} from "../locale-date.js";
import { runRules, type ExtractionRule, type RuleReading } from "../rule-runner.js";
import { WORD_END, WORD_START } from "../text-patterns.js";
import type { ExtractionResult } from "../types.js";

const MONTH = `(?<month>${MONTH_NAME_SOURCE})\\.?`;
// never the hour of a trailing time ("15 de marzo 10:30")
const YEAR = "(?<year>\\d{4}|\\d{2})(?!:\\d)";
const TIME_SUFFIX =
  /^(?:,| -| a las| at)? ?(?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<second>\d{2}))?(?: ?(?:hs|hrs|h)\.?(?![\p{L}]))?/iu;

export const DATE_RULES: ReadonlyArray<ExtractionRule<string>> = [
  {
    // 5 de marzo de 2024, 05 mar 2024, 5 de marzo del 2024
    name: "day-month-name",
    pattern: new RegExp(
      `${WORD_START}(?<day>\\d{1,2}) (?:de )?${MONTH}(?: del?)?,? ${YEAR}${WORD_END}`,
      "iu",
    ),
    confidence: "high",
    read: (match, text) => readDate(match, text, namedMonth),
  },
  {
    // March 5, 2024
    name: "month-name-day",
    pattern: new RegExp(
      `${WORD_START}${MONTH} (?<day>\\d{1,2})(?:st|nd|rd|th)?,? (?<year>\\d{4})${WORD_END}`,
      "iu",
    ),
    confidence: "high",
    read: (match, text) => readDate(match, text, namedMonth),
  },
  {
    name: "iso-date",
    pattern: /(?<![\p{N}])(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})(?![\p{N}])/u,
    confidence: "high",
    read: (match, text) => readDate(match, text, numericMonth),
  },
  {
    // day first: 05/03/2024, 5-3-24, 05.03.2024
    name: "numeric-date",
    pattern:
      /(?<![\p{N}.,/-])(?<day>\d{1,2})(?<sep>[/.-])(?<month>\d{1,2})\k<sep>(?<year>\d{4}|\d{2})(?![\p{N}]|[.,]\d)/u,
    confidence: "high",
    read: (match, text) => readDate(match, text, numericMonth),
  },
];

export function extractOccurredAt(normalizedText: string): ExtractionResult<string> {
  return runRules(normalizedText, DATE_RULES);
}

function namedMonth(token: string): number | null {
  return monthFromName(token);
}

function numericMonth(token: string): number | null {
  const month = Number.parseInt(token, 10);
  return Number.isFinite(month) ? month : null;
}

function readDate(
  match: RegExpExecArray,
  text: string,
  readMonth: (token: string) => number | null,
): RuleReading<string> | null {
  const groups = match.groups ?? {};
  const month = groups.month ? readMonth(groups.month) : null;
  const year = groups.year ? parseYearToken(groups.year) : null;
  const day = groups.day ? Number.parseInt(groups.day, 10) : Number.NaN;
  if (month === null || year === null || !Number.isFinite(day)) {
    return null;
  }

  const end = match.index + match[0].length;
  const parts: LocalDateParts = { year, month, day };
  const time = TIME_SUFFIX.exec(text.slice(end));
  if (time?.groups) {
    parts.hour = Number.parseInt(time.groups.hour ?? "", 10);
    parts.minute = Number.parseInt(time.groups.minute ?? "", 10);
    parts.second = time.groups.second ? Number.parseInt(time.groups.second, 10) : 0;
  }

  const withTime = time ? parseLocaleDate(parts) : null;
  if (withTime && time) {
    return { value: withTime, span: { start: match.index, end: end + time[0].length } };
  }

  const dateOnly = parseLocaleDate({ year, month, day });
  return dateOnly ? { value: dateOnly, span: { start: match.index, end } } : null;
}
