export * from "./walkHierarchy.js";
