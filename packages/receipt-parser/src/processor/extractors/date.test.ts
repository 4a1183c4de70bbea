import { describe, expect, it } from "vitest";
import { extractOccurredAt } from "./date.js";

describe("extractOccurredAt", () => {
  it("reads day-first numeric dates", () => {
    const text = "Pago del 05/03/2024.";

    expect(extractOccurredAt(text)).toEqual({
      value: "2024-03-05T00:00:00",
      matchedSpan: { start: 9, end: 19 },
      confidence: "high",
    });
    expect(extractOccurredAt("05.03.24").value).toBe("2024-03-05T00:00:00");
  });

  it("reads Spanish month names with a trailing time", () => {
    expect(extractOccurredAt("5 de marzo de 2024 a las 14:30 hs").value).toBe("2024-03-05T14:30:00");
    expect(extractOccurredAt("Fecha: 15 de septiembre 2023, 09:05").value).toBe(
      "2023-09-15T09:05:00",
    );
  });

  it("does not read the hour of a time as a two-digit year", () => {
    expect(extractOccurredAt("Pagaste $100 el 15 de marzo 10:30 hs").value).toBeNull();
    expect(extractOccurredAt("15 de marzo, 18:42").value).toBeNull();
    expect(extractOccurredAt("15 de marzo de 2024, 18:42").value).toBe("2024-03-15T18:42:00");
    expect(extractOccurredAt("15 mar 24 10:30").value).toBe("2024-03-15T10:30:00");
  });

  it("reads English and ISO dates", () => {
    expect(extractOccurredAt("March 5, 2024").value).toBe("2024-03-05T00:00:00");
    expect(extractOccurredAt("2024-03-05 10:15:20").value).toBe("2024-03-05T10:15:20");
  });

  it("rejects impossible dates", () => {
    expect(extractOccurredAt("31/02/2024").value).toBeNull();
  });

  it("does not mistake amounts for dates", () => {
    expect(extractOccurredAt("Pagaste $1.234,56").value).toBeNull();
  });
});
