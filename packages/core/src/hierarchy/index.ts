export * from "./types.js";
export * from "./HierarchyGraph.js";
export * from "./definition.js";
export * from "./classEntity.js";
