import { parseDocument } from "yaml";
import { z } from "zod";
import { err, ok } from "../result/result.js";
import type { Result } from "../result/result.js";
import type { Sequence } from "../sequence/index.js";
import { HierarchyGraph } from "./HierarchyGraph.js";
import type { Entity, HierarchyError, HierarchyInstance } from "./types.js";

export const EntityDefinition = z.object({
  id: z.string().min(1).describe("Unique entity id"),
  name: z.string().optional().describe("Display name, defaults to the id"),
  parents: z
    .array(z.string().min(1))
    .describe("Direct parents, in declaration order")
    .default([]),
});

export const HierarchyDefinition = z.object({
  entities: z.array(EntityDefinition),
  registry: z
    .array(z.string().min(1))
    .describe(
      "Ordered registry of entity ids; duplicates allowed. Defaults to every entity in declaration order"
    )
    .optional(),
});

export type HierarchyDefinition = z.infer<typeof HierarchyDefinition>;

export type LoadedHierarchy = {
  graph: HierarchyGraph;
  registry: Sequence<Entity<HierarchyInstance>>;
};

export function loadHierarchyDefinition(
  definition: HierarchyDefinition
): Result<LoadedHierarchy, HierarchyError> {
  const built = HierarchyGraph.build(definition.entities);
  if (!built.success) {
    return built;
  }
  const graph = built.data;

  if (definition.registry === undefined) {
    return ok({ graph, registry: graph.entities });
  }

  const registry = graph.registry(definition.registry);
  if (!registry.success) {
    return registry;
  }
  return ok({ graph, registry: registry.data });
}

/**
 * Parse a YAML hierarchy document:
 *
 * ```yaml
 * entities:
 *   - id: A
 *   - id: B
 *     parents: [A]
 * registry: [B, A, B]
 * ```
 */
export function parseHierarchyDefinition(
  text: string
): Result<LoadedHierarchy, HierarchyError> {
  const doc = parseDocument(text);
  const [yamlError] = doc.errors;
  if (yamlError) {
    return err({ type: "invalidDocument", message: yamlError.message });
  }

  const parsed = HierarchyDefinition.safeParse(doc.toJS());
  if (!parsed.success) {
    return err({
      type: "invalidDocument",
      message: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
    });
  }

  return loadHierarchyDefinition(parsed.data);
}
