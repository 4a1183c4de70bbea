import { describe, expect, it } from "vitest";
import { extractTransactionId } from "./identifier.js";

describe("extractTransactionId", () => {
  it("reads an ID label", () => {
    const text = "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024. ID: ABC123";
    const start = text.indexOf("ABC123");

    expect(extractTransactionId(text)).toEqual({
      value: "ABC123",
      matchedSpan: { start, end: start + 6 },
      confidence: "high",
    });
  });

  it("reads numbered and labeled operation references", () => {
    expect(extractTransactionId("Número de operación: 123456789").value).toBe("123456789");
    expect(extractTransactionId("Operación #98765432").value).toBe("98765432");
    expect(extractTransactionId("Comprobante Nro. 0001-00012345").value).toBe("0001-00012345");
    expect(extractTransactionId("Pago N° 4455667").value).toBe("4455667");
  });

  it("ignores labels followed by a token without digits", () => {
    expect(extractTransactionId("ID: ABCDEF").value).toBeNull();
  });

  it("returns an absent result when nothing matches", () => {
    expect(extractTransactionId("Pagaste $500 en Kiosco")).toEqual({
      value: null,
      matchedSpan: null,
      confidence: "low",
    });
  });
});
