import type { Option } from "../result/result.js";

/**
 * A registered type. Entities are compared by identity; the library never
 * creates or mutates the ones a host hands it.
 */
export interface Entity<T = unknown> {
  readonly id: string;
  readonly name: string;
  /**
   * View a live value through this entity's shape. None means the value is
   * not an instance of this entity, which callers treat as "nothing to do".
   */
  narrow(value: unknown): Option<T>;
}

/**
 * `derivesFrom(ancestor, descendant)` holds when `ancestor` is an ancestor of
 * `descendant` or the same entity. Expected to be transitive; nothing checks.
 */
export type DerivationRelation<E> = (ancestor: E, descendant: E) => boolean;

/** A value created for a concrete entity of a `HierarchyGraph`. */
export interface HierarchyInstance {
  readonly entity: string;
}

export type EntityDeclaration = {
  id: string;
  /** Display name; defaults to the id */
  name?: string;
  /** Ids of the direct parents, in declaration order */
  parents: string[];
};

export type HierarchyError =
  | { type: "invalidDocument"; message: string }
  | { type: "duplicateEntity"; id: string }
  | { type: "unknownParent"; id: string; parent: string }
  | { type: "unknownEntity"; id: string }
  | { type: "cycle"; path: string[] };
