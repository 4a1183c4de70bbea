import { describe, expect, it } from "vitest";
import { extractDescription } from "./description.js";

describe("extractDescription", () => {
  it("prefers a labeled detail", () => {
    expect(extractDescription("Detalle: Suscripción mensual\nTotal: $999")).toEqual({
      value: "Suscripción mensual",
      matchedSpan: { start: 9, end: 28 },
      confidence: "high",
    });
  });

  it("picks the sentence that carries the amount", () => {
    const text = "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024. ID: ABC123";

    expect(extractDescription(text)).toEqual({
      value: "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024",
      matchedSpan: { start: 0, end: 58 },
      confidence: "high",
    });
  });

  it("considers lines next to the amount", () => {
    const text = "Comprobante de pago\nPagaste $300 en Farmacia Central\nGracias por usar la app";

    expect(extractDescription(text).value).toBe("Pagaste $300 en Farmacia Central");
  });

  it("falls back to the first line with low confidence", () => {
    expect(extractDescription("Hola\nsin números aquí")).toEqual({
      value: "Hola",
      matchedSpan: { start: 0, end: 4 },
      confidence: "low",
    });
  });

  it("returns absent for empty text", () => {
    expect(extractDescription("").value).toBeNull();
  });
});
