import { foldAccents, keywordAlternation } from "./text-patterns.js";

const MONTH_FORMS: ReadonlyArray<readonly string[]> = [
  ["enero", "ene", "january", "jan"],
  ["febrero", "feb", "february"],
  ["marzo", "mar", "march"],
  ["abril", "abr", "april", "apr"],
  ["mayo", "may"],
  ["junio", "jun", "june"],
  ["julio", "jul", "july"],
  ["agosto", "ago", "august", "aug"],
  ["septiembre", "setiembre", "sept", "sep", "set", "september"],
  ["octubre", "oct", "october"],
  ["noviembre", "nov", "november"],
  ["diciembre", "dic", "december", "dec"],
];

const MONTH_BY_NAME = new Map<string, number>(
  MONTH_FORMS.flatMap((forms, index) => forms.map((form) => [form, index + 1] as const)),
);

/** Alternation of every month spelling, longest first. */
export const MONTH_NAME_SOURCE = keywordAlternation(MONTH_FORMS.flat());

const MIN_YEAR = 1900;
const MAX_YEAR = 2099;
const TWO_DIGIT_YEAR_PIVOT = 50;

export type LocalDateParts = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
};

export function monthFromName(name: string): number | null {
  const key = foldAccents(name.trim().toLowerCase()).replace(/\.$/, "");
  return MONTH_BY_NAME.get(key) ?? null;
}

/** `24` -> 2024, `87` -> 1987. */
export function expandTwoDigitYear(year: number): number {
  return year < TWO_DIGIT_YEAR_PIVOT ? 2000 + year : 1900 + year;
}

export function parseYearToken(token: string): number | null {
  if (!/^\d{2}$|^\d{4}$/.test(token)) {
    return null;
  }
  const year = Number.parseInt(token, 10);
  return token.length === 2 ? expandTwoDigitYear(year) : year;
}

/**
 * Formats calendar parts as a zone-less ISO date-time (`YYYY-MM-DDTHH:mm:ss`).
 * Returns null for impossible dates (31/02, month 13) and out-of-range years.
 */
export function parseLocaleDate(parts: LocalDateParts): string | null {
  const { year, month, day } = parts;
  const hour = parts.hour ?? 0;
  const minute = parts.minute ?? 0;
  const second = parts.second ?? 0;

  if (year < MIN_YEAR || year > MAX_YEAR || month < 1 || month > 12 || day < 1) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const calendarDate = new Date(Date.UTC(year, month - 1, day));
  if (calendarDate.getUTCMonth() !== month - 1 || calendarDate.getUTCDate() !== day) {
    return null;
  }

  return `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
