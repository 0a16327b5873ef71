import { none, some } from "../result/result.js";
import type { DerivationRelation, Entity } from "./types.js";

export type Constructor<T extends object = object> = abstract new (
  ...args: never[]
) => T;

/**
 * Native subclassing as a derivation relation: true when `descendant` is
 * `ancestor` or extends it somewhere along its prototype chain.
 */
export function classDerivesFrom(
  ancestor: Constructor,
  descendant: Constructor
): boolean {
  if (ancestor === descendant) return true;
  const proto: unknown = descendant.prototype;
  return proto instanceof ancestor;
}

export interface ClassEntity<T extends object> extends Entity<T> {
  readonly ctor: Constructor<T>;
}

/**
 * Wrap a class as an entity. Create one per class and reuse it: the
 * resolver tells entities apart by identity, not by name.
 */
export function classEntity<T extends object>(
  ctor: Constructor<T>,
  name: string = ctor.name
): ClassEntity<T> {
  return {
    id: name,
    name,
    ctor,
    narrow: (value) => (value instanceof ctor ? some(value) : none()),
  };
}

export const classEntityDerivesFrom: DerivationRelation<ClassEntity<object>> = (
  ancestor,
  descendant
) => classDerivesFrom(ancestor.ctor, descendant.ctor);
