import { describe, expect, it } from "vitest";
import { extractMerchant } from "./merchant.js";

describe("extractMerchant", () => {
  it("reads a capitalized name after a preposition", () => {
    const text = "Pagaste $45,50 en Supermercado XYZ";
    const start = text.indexOf("Supermercado");

    expect(extractMerchant(text)).toEqual({
      value: "Supermercado XYZ",
      matchedSpan: { start, end: text.length },
      confidence: "high",
    });
    expect(extractMerchant("Transferencia a Ana Gómez").value).toBe("Ana Gómez");
  });

  it("stops at lowercase words", () => {
    const text = "Recibiste un pago de $1.000,00 de Juan Perez el 05/03/2024. ID: ABC123";

    expect(extractMerchant(text).value).toBe("Juan Perez");
  });

  it("reads labeled counterparties", () => {
    expect(extractMerchant("Vendedor: Kiosco Don Pepe\nTotal: $300").value).toBe("Kiosco Don Pepe");
  });

  it("prefers a labeled counterparty over an earlier capitalized phrase", () => {
    expect(
      extractMerchant("Comprobante de Pago\nPagaste $500\nDestinatario: Juan Perez").value,
    ).toBe("Juan Perez");
    expect(extractMerchant("Total a Pagar: $500\nComercio: Kiosco Sol").value).toBe("Kiosco Sol");
  });

  it("does not take payment words for a name", () => {
    expect(extractMerchant("Total a Pagar: $500").value).toBeNull();
    expect(extractMerchant("Comprobante de Transferencia").value).toBeNull();
  });

  it("ignores month names", () => {
    expect(extractMerchant("Pago el 5 de Marzo de 2024").value).toBeNull();
  });
});
