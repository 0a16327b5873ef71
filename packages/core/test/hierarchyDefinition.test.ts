import { describe, it, expect } from "vitest";
import dedent from "dedent";
import {
  HierarchyDefinition,
  parseHierarchyDefinition,
} from "../src/hierarchy/index.js";
import { unwrap } from "../src/result/result.js";
import { ids, loadDiamond } from "./utils/diamond.js";

describe("parseHierarchyDefinition", () => {
  it("builds the graph and the registry", () => {
    const { graph, registry } = unwrap(
      parseHierarchyDefinition(dedent`
        entities:
          - id: animal
            name: Animal
          - id: pet
            parents: [animal]
          - id: dog
            parents: [pet]
        registry: [dog, animal, pet, dog]
      `)
    );

    expect(ids(registry)).toEqual(["dog", "animal", "pet", "dog"]);
    expect(registry[0]).toBe(graph.entity("dog"));
    expect(graph.entity("animal").name).toBe("Animal");
    expect(graph.directParents("dog")).toEqual(["pet"]);
  });

  it("defaults the registry to every entity in declaration order", () => {
    const { registry } = unwrap(
      parseHierarchyDefinition(dedent`
        entities:
          - id: B
            parents: [A]
          - id: A
      `)
    );
    expect(ids(registry)).toEqual(["B", "A"]);
  });

  it("loads the diamond fixture", () => {
    const { graph, registry } = loadDiamond();
    expect(graph.entities).toHaveLength(14);
    expect(ids(registry)).toEqual([
      "I", "C", "Z", "G", "D", "F", "L", "C", "I", "A", "T", "B", "J", "K",
      "H", "E", "E",
    ]);
  });

  it("reports malformed YAML", () => {
    const result = parseHierarchyDefinition("entities: [");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalidDocument");
    }
  });

  it("reports schema violations with their path", () => {
    const result = parseHierarchyDefinition(dedent`
      entities:
        - parents: [A]
    `);
    expect(result.success).toBe(false);
    if (!result.success && result.error.type === "invalidDocument") {
      expect(result.error.message).toContain("entities.0.id");
    } else {
      expect.unreachable("expected an invalidDocument error");
    }
  });

  it("reports registry entries that are not declared", () => {
    expect(
      parseHierarchyDefinition(dedent`
        entities:
          - id: A
        registry: [A, Q]
      `)
    ).toEqual({ success: false, error: { type: "unknownEntity", id: "Q" } });
  });

  it("reports cycles", () => {
    expect(
      parseHierarchyDefinition(dedent`
        entities:
          - id: A
            parents: [B]
          - id: B
            parents: [A]
      `)
    ).toEqual({ success: false, error: { type: "cycle", path: ["A", "B", "A"] } });
  });
});

describe("HierarchyDefinition", () => {
  it("defaults parents to an empty list", () => {
    expect(HierarchyDefinition.parse({ entities: [{ id: "A" }] })).toEqual({
      entities: [{ id: "A", parents: [] }],
    });
  });
});
