import type { CategoryRule } from "./types.js";

/**
 * Built-in category table, scanned top to bottom. Keywords match case- and
 * accent-insensitively at the start of a word, so "farmac" also covers
 * "farmacia"; keywords of five letters or fewer must be the whole word.
 */
export const DEFAULT_CATEGORY_RULES: ReadonlyArray<CategoryRule> = [
  { category: "salary", keywords: ["sueldo", "salario", "haberes", "nómina", "payroll", "salary"] },
  {
    category: "groceries",
    keywords: ["supermercado", "super", "almacén", "verdulería", "carnicería", "grocery"],
  },
  {
    category: "dining",
    keywords: [
      "restaurante",
      "restaurant",
      "parrilla",
      "pizzería",
      "café",
      "cafeter",
      "bar",
      "rappi",
      "pedidosya",
    ],
  },
  {
    category: "transport",
    keywords: ["uber", "cabify", "didi", "taxi", "remis", "subte", "colectivo", "sube", "peaje", "nafta", "combustible", "ypf"],
  },
  {
    category: "utilities",
    keywords: ["edenor", "edesur", "metrogas", "aysa", "luz", "electricidad", "internet", "telefonía", "celular"],
  },
  {
    category: "health",
    keywords: ["farmac", "médico", "médica", "clínica", "hospital", "osde", "obra social"],
  },
  {
    category: "subscriptions",
    keywords: ["netflix", "spotify", "disney", "youtube", "suscripción", "subscription"],
  },
  { category: "housing", keywords: ["alquiler", "expensas", "rent"] },
  { category: "shopping", keywords: ["tienda", "shop", "store", "indumentaria", "ropa"] },
  { category: "transfers", keywords: ["transferencia", "transfer"] },
];
