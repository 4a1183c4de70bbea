import { describe, expect, it } from "vitest";
import { matchSpan, runRules, type ExtractionRule } from "./rule-runner.js";

const word: ExtractionRule<string> = {
  name: "word",
  pattern: /[a-z]+/u,
  confidence: "high",
  read: (match) => ({ value: match[0], span: matchSpan(match) }),
};

const nonZeroDigits: ExtractionRule<string> = {
  name: "digits",
  pattern: /\d+/u,
  confidence: "low",
  read: (match) => (match[0] === "0" ? null : { value: match[0], span: matchSpan(match) }),
};

describe("runRules", () => {
  it("keeps the match that starts earliest", () => {
    expect(runRules("12 abc", [word, nonZeroDigits])).toEqual({
      value: "12",
      matchedSpan: { start: 0, end: 2 },
      confidence: "low",
    });
    expect(runRules("abc 12", [word, nonZeroDigits]).value).toBe("abc");
  });

  it("breaks ties at the same position by rule order", () => {
    const single: ExtractionRule<string> = {
      ...nonZeroDigits,
      name: "single",
      read: (match) => ({ value: `single:${match[0]}`, span: matchSpan(match) }),
    };

    expect(runRules("75", [nonZeroDigits, single]).value).toBe("75");
    expect(runRules("75", [single, nonZeroDigits]).value).toBe("single:75");
  });

  it("moves past rejected matches", () => {
    expect(runRules("0 5", [nonZeroDigits]).matchedSpan).toEqual({ start: 2, end: 3 });
  });

  it("takes the lower of rule and reading confidence", () => {
    const hedged: ExtractionRule<string> = {
      ...word,
      read: (match) => ({ value: match[0], span: matchSpan(match), confidence: "low" }),
    };

    expect(runRules("abc", [hedged]).confidence).toBe("low");
  });

  it("returns absent for empty text", () => {
    expect(runRules("", [word])).toEqual({ value: null, matchedSpan: null, confidence: "low" });
  });
});
