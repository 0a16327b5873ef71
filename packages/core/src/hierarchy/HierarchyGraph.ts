import { err, fromNullable, none, ok, some } from "../result/result.js";
import type { Option, Result } from "../result/result.js";
import type { Sequence } from "../sequence/index.js";
import type {
  DerivationRelation,
  Entity,
  EntityDeclaration,
  HierarchyError,
  HierarchyInstance,
} from "./types.js";

type GraphNode = {
  entity: GraphEntity;
  parents: string[];
};

const isHierarchyInstance = (value: unknown): value is HierarchyInstance =>
  typeof value === "object" &&
  value !== null &&
  "entity" in value &&
  typeof value.entity === "string";

class GraphEntity implements Entity<HierarchyInstance> {
  constructor(
    readonly id: string,
    readonly name: string,
    private readonly graph: HierarchyGraph
  ) {}

  narrow(value: unknown): Option<HierarchyInstance> {
    if (
      isHierarchyInstance(value) &&
      this.graph.derivesFromId(this.id, value.entity)
    ) {
      return some(value);
    }
    return none();
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Explicit multi-root, multiple-inheritance hierarchy.
 *
 * Entities are declared with their direct parents; `derivesFrom` answers
 * from the reflexive transitive closure, computed lazily per entity and
 * memoized. The graph is immutable once built.
 */
export class HierarchyGraph {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly closure = new Map<string, Set<string>>();

  private constructor() {}

  /**
   * Build a graph from declarations. Fails on duplicate ids, parents that are
   * never declared, and cycles.
   */
  static build(
    declarations: readonly EntityDeclaration[]
  ): Result<HierarchyGraph, HierarchyError> {
    const graph = new HierarchyGraph();

    for (const decl of declarations) {
      if (graph.nodes.has(decl.id)) {
        return err({ type: "duplicateEntity", id: decl.id });
      }
      graph.nodes.set(decl.id, {
        entity: new GraphEntity(decl.id, decl.name ?? decl.id, graph),
        parents: [...decl.parents],
      });
    }

    for (const decl of declarations) {
      const missing = decl.parents.find((parent) => !graph.nodes.has(parent));
      if (missing !== undefined) {
        return err({ type: "unknownParent", id: decl.id, parent: missing });
      }
    }

    const cycle = graph.findCycle();
    if (cycle) {
      return err({ type: "cycle", path: cycle });
    }

    return ok(graph);
  }

  /** All entities, in declaration order. */
  get entities(): Entity<HierarchyInstance>[] {
    return [...this.nodes.values()].map((node) => node.entity);
  }

  findEntity(id: string): Option<Entity<HierarchyInstance>> {
    return fromNullable(this.nodes.get(id)?.entity);
  }

  /**
   * @throws Error if `id` was never declared
   */
  entity(id: string): Entity<HierarchyInstance> {
    return this.getNode(id).entity;
  }

  directParents(id: string): string[] {
    return [...this.getNode(id).parents];
  }

  /**
   * Look up entities by id, in the given order. Repeated ids produce repeated
   * entries, so the result can serve as a registry with duplicates.
   */
  registry(ids: readonly string[]): Result<Sequence<Entity<HierarchyInstance>>, HierarchyError> {
    const entities: Entity<HierarchyInstance>[] = [];
    for (const id of ids) {
      const node = this.nodes.get(id);
      if (!node) {
        return err({ type: "unknownEntity", id });
      }
      entities.push(node.entity);
    }
    return ok(entities);
  }

  instantiate(id: string): HierarchyInstance {
    this.getNode(id);
    return { entity: id };
  }

  derivesFromId(ancestorId: string, descendantId: string): boolean {
    if (!this.nodes.has(ancestorId) || !this.nodes.has(descendantId)) {
      return false;
    }
    return this.ancestorsOf(descendantId).has(ancestorId);
  }

  /**
   * Derivation relation over this graph's entities. Entities from elsewhere
   * are never related to anything.
   */
  readonly derivesFrom: DerivationRelation<Entity> = (ancestor, descendant) =>
    this.owns(ancestor) &&
    this.owns(descendant) &&
    this.derivesFromId(ancestor.id, descendant.id);

  private owns(entity: Entity): boolean {
    return this.nodes.get(entity.id)?.entity === entity;
  }

  private getNode(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new Error(`Entity "${id}" is not part of this hierarchy`);
    }
    return node;
  }

  // Graph is acyclic by construction, so the recursion terminates.
  private ancestorsOf(id: string): Set<string> {
    const cached = this.closure.get(id);
    if (cached) return cached;

    const result = new Set<string>([id]);
    for (const parent of this.getNode(id).parents) {
      for (const ancestor of this.ancestorsOf(parent)) {
        result.add(ancestor);
      }
    }
    this.closure.set(id, result);
    return result;
  }

  /**
   * Depth-first search over parent links; returns the first cycle found as
   * a path that starts and ends with the same id.
   */
  private findCycle(): string[] | undefined {
    const done = new Set<string>();
    const onStack: string[] = [];

    const visit = (id: string): string[] | undefined => {
      const start = onStack.indexOf(id);
      if (start !== -1) {
        return [...onStack.slice(start), id];
      }
      if (done.has(id)) return undefined;

      onStack.push(id);
      for (const parent of this.getNode(id).parents) {
        const cycle = visit(parent);
        if (cycle) return cycle;
      }
      onStack.pop();
      done.add(id);
      return undefined;
    };

    for (const id of this.nodes.keys()) {
      const cycle = visit(id);
      if (cycle) return cycle;
    }
    return undefined;
  }
}
