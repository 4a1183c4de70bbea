export * from "./processor/category-rules.js";
export * from "./processor/classifier.js";
export * from "./processor/extractors/amount.js";
export * from "./processor/extractors/date.js";
export * from "./processor/extractors/description.js";
export * from "./processor/extractors/identifier.js";
export * from "./processor/extractors/merchant.js";
export * from "./processor/locale-date.js";
export * from "./processor/locale-number.js";
export * from "./processor/receipt-parser.js";
export * from "./processor/rule-runner.js";
export * from "./processor/text-normalizer.js";
export * from "./processor/text-patterns.js";
export * from "./processor/types.js";
