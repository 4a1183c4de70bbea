import { describe, expect, it } from "vitest";
import { foldAccents, keywordAlternation, keywordSource } from "./text-patterns.js";

describe("keywordSource", () => {
  it("tolerates accents in either direction", () => {
    const pattern = new RegExp(`^(?:${keywordSource("depósito")})$`, "iu");

    expect(pattern.test("Deposito")).toBe(true);
    expect(pattern.test("DEPÓSITO")).toBe(true);
    expect(pattern.test("depositos")).toBe(false);
  });

  it("allows repeated spaces between words", () => {
    expect(new RegExp(keywordSource("te pagó"), "iu").test("te  pago")).toBe(true);
  });

  it("escapes regex syntax", () => {
    expect(new RegExp(`^${keywordSource("u$s")}$`, "iu").test("U$S")).toBe(true);
  });
});

describe("keywordAlternation", () => {
  it("puts longer keywords first", () => {
    expect(keywordAlternation(["sep", "sept"])).toBe("s[eéè]pt|s[eéè]p");
  });
});

describe("foldAccents", () => {
  it("removes combining marks", () => {
    expect(foldAccents("acreditación ñandú")).toBe("acreditacion nandu");
  });
});
