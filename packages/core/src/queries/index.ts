export * from "./AncestorCache.js";
