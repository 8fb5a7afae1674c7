// Pure calculation core: no I/O, errors returned as data
export * from "./money.js";
export * from "./rounding.js";
export * from "./itemized.js";
export * from "./shares.js";
export * from "./netting.js";
export * from "./transfers.js";
export * from "./aggregator.js";
export * from "./breakdown.js";
export * from "./validator.js";
