export * from "./resolveAncestors.js";
export * from "./AncestorResolver.js";
