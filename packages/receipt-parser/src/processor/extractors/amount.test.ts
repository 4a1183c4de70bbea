import { describe, expect, it } from "vitest";
import { extractAmount, findDirectionCue } from "./amount.js";

describe("extractAmount", () => {
  it("reads a currency amount and attaches the direction cue", () => {
    expect(extractAmount("Pagaste $45,50 en Supermercado XYZ")).toEqual({
      value: {
        magnitude: 45.5,
        sign: "none",
        cue: { direction: "expense", keyword: "Pagaste", span: { start: 0, end: 7 } },
      },
      matchedSpan: { start: 9, end: 14 },
      confidence: "high",
    });
  });

  it("reads labeled amounts but not labeled counts", () => {
    expect(extractAmount("Total: $1.234,56").value?.magnitude).toBe(1234.56);
    expect(extractAmount("Total 2 items $10").value?.magnitude).toBe(10);
  });

  it("reads amounts with a currency word after the number", () => {
    expect(extractAmount("Monto 1500 pesos").value?.magnitude).toBe(1500);
  });

  it("reads explicit signs and accounting parentheses", () => {
    expect(extractAmount("Reintegro +$200").value?.sign).toBe("positive");

    const debit = extractAmount("Débito -$1.500,00").value;
    expect(debit?.magnitude).toBe(1500);
    expect(debit?.sign).toBe("negative");

    expect(extractAmount("($ 250,00)").value).toEqual({ magnitude: 250, sign: "negative", cue: null });
  });

  it("skips zero amounts and keeps looking", () => {
    expect(extractAmount("Pagaste $0,00 y luego $12").value?.magnitude).toBe(12);
    expect(extractAmount("Pagaste $0,00").value).toBeNull();
  });

  it("lowers confidence for ambiguous separators", () => {
    const result = extractAmount("$1.000");

    expect(result.value?.magnitude).toBe(1000);
    expect(result.confidence).toBe("low");
  });

  it("reads space-grouped thousands as one amount", () => {
    expect(extractAmount("Pagaste $ 1 234,56 en Kiosco")).toMatchObject({
      value: { magnitude: 1234.56, sign: "none" },
      matchedSpan: { start: 10, end: 18 },
    });
    expect(extractAmount("Total: 12 500 pesos").value?.magnitude).toBe(12500);
    expect(extractAmount("Pagaste $100 2024").value?.magnitude).toBe(100);
  });

  it("ignores noun cues away from the amount", () => {
    const text = "Compra en Tienda Sol $1.200,00\nPolítica de devolución: 30 días";

    expect(extractAmount(text).value?.cue).toEqual({
      direction: "expense",
      keyword: "Compra",
      span: { start: 0, end: 6 },
    });
  });

  it("keeps a noun cue on the line above the amount", () => {
    expect(extractAmount("Reintegro\nTotal: $200").value?.cue?.direction).toBe("income");
    expect(extractAmount("Reintegro\nSucursal Centro\nTotal: $200").value?.cue).toBeNull();
  });

  it("returns absent when there is no amount", () => {
    expect(extractAmount("Hola mundo").value).toBeNull();
  });
});

describe("findDirectionCue", () => {
  it("prefers explicit verbs over generic nouns", () => {
    expect(findDirectionCue("Recibiste un pago de $10")?.direction).toBe("income");
    expect(findDirectionCue("Devolución de compra")?.direction).toBe("income");
    expect(findDirectionCue("Compra en Tienda")?.direction).toBe("expense");
  });

  it("tolerates missing accents", () => {
    expect(findDirectionCue("Deposito en cuenta")).toEqual({
      direction: "income",
      keyword: "Deposito",
      span: { start: 0, end: 8 },
    });
  });

  it("reads passive Spanish income forms", () => {
    expect(findDirectionCue("Transferencia recibida de Juan Perez $ 5.000,00")).toEqual({
      direction: "income",
      keyword: "recibida",
      span: { start: 14, end: 22 },
    });
    expect(findDirectionCue("Dinero acreditado en tu cuenta")?.direction).toBe("income");
  });

  it("limits noun cues to the lines around the given amount span", () => {
    const text = "Compra en Tienda Sol $1.200,00\nPolítica de devolución: 30 días";

    expect(findDirectionCue(text)?.keyword).toBe("devolución");
    expect(findDirectionCue(text, { start: 22, end: 30 })?.keyword).toBe("Compra");
  });

  it("applies explicit verbs anywhere in the text", () => {
    const text = "Total: $500\nLínea 2\nLínea 3\nRecibiste este dinero";

    expect(findDirectionCue(text, { start: 8, end: 11 })?.keyword).toBe("Recibiste");
  });

  it("returns null without a cue", () => {
    expect(findDirectionCue("Sin palabras")).toBeNull();
  });
});
