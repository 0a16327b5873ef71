export * from "./Sequence.js";
export * from "./errors.js";
