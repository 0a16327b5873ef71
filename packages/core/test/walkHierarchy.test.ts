import { describe, it, expect } from "vitest";
import { resolveAncestors } from "../src/resolver/index.js";
import { walkHierarchy, walkNarrowed } from "../src/walker/index.js";
import { unwrap } from "../src/result/result.js";
import { ids, loadDiamond } from "./utils/diamond.js";

describe("walkHierarchy", () => {
  it("visits every entity in order with the same instance", () => {
    const instance = { label: "target" };
    const visits: [string, object][] = [];

    walkHierarchy(["base", "middle", "leaf"], instance, (entity, target) => {
      visits.push([entity, target]);
    });

    expect(visits).toEqual([
      ["base", instance],
      ["middle", instance],
      ["leaf", instance],
    ]);
    expect(visits[0]?.[1]).toBe(instance);
  });

  it("performs no visits over an empty sequence", () => {
    let count = 0;
    walkHierarchy([], {}, () => {
      count++;
    });
    expect(count).toBe(0);
  });
});

describe("walkNarrowed", () => {
  const { graph, registry } = loadDiamond();

  it("prints the ancestors of D and K base-first", () => {
    const lines: string[] = [];
    for (const query of ["D", "K"]) {
      const ancestors = resolveAncestors(
        registry,
        graph.entity(query),
        graph.derivesFrom
      );
      walkNarrowed(ancestors, graph.instantiate(query), (entity) => {
        lines.push(`base = ${entity.name}`);
      });
    }

    expect(lines).toEqual([
      "base = A",
      "base = C",
      "base = D",
      "base = F",
      "base = H",
      "base = J",
      "base = I",
      "base = K",
    ]);
  });

  it("hands the narrowed view to the visitor", () => {
    const instance = graph.instantiate("K");
    const views: unknown[] = [];

    walkNarrowed(unwrap(graph.registry(["F", "K"])), instance, (_, view) => {
      views.push(view);
    });

    expect(views).toEqual([instance, instance]);
    expect(views[0]).toBe(instance);
  });

  it("skips steps the instance does not narrow to and keeps going", () => {
    const visited: string[] = [];
    const skipped: string[] = [];

    walkNarrowed(
      unwrap(graph.registry(["F", "G", "H", "Z"])),
      graph.instantiate("K"),
      (entity) => visited.push(entity.id),
      { onSkip: (entity) => skipped.push(entity.id) }
    );

    expect(visited).toEqual(["F", "H"]);
    expect(skipped).toEqual(["G", "Z"]);
  });

  it("visits nothing for a query without registered ancestors", () => {
    const unrelated = unwrap(graph.registry(["A", "B", "T"]));
    const ancestors = resolveAncestors(
      unrelated,
      graph.entity("L"),
      graph.derivesFrom
    );
    const visited: string[] = [];

    walkNarrowed(ancestors, graph.instantiate("L"), (entity) =>
      visited.push(entity.id)
    );

    expect(ids(ancestors)).toEqual([]);
    expect(visited).toEqual([]);
  });
});
