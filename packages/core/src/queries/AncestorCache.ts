import { md5 } from "js-md5";
import type { DerivationRelation } from "../hierarchy/types.js";
import { resolveAncestors } from "../resolver/resolveAncestors.js";
import type { Sequence } from "../sequence/index.js";

export type HashedResolutionKey = string & { __hashed?: true };

type Identified = { readonly id: string };

/**
 * Hash of a registry snapshot plus a query, by entity id. Registry order and
 * duplicates are part of the key since both affect the resolution.
 */
export const hashResolutionKey = (
  registry: Sequence<Identified>,
  query: Identified
): HashedResolutionKey => {
  return md5(
    JSON.stringify({
      registry: registry.map((entity) => entity.id),
      query: query.id,
    })
  );
};

/**
 * Memoizes `resolveAncestors` for one derivation relation.
 *
 * Keys are built from entity ids, so ids must be unique among the entities
 * passed to a single cache, and registries must not change after they have
 * been resolved.
 */
export class AncestorCache<E extends Identified> {
  private store = new Map<HashedResolutionKey, Sequence<E>>();

  constructor(private readonly derivesFrom: DerivationRelation<E>) {}

  get size(): number {
    return this.store.size;
  }

  has(registry: Sequence<E>, query: E): boolean {
    return this.store.has(hashResolutionKey(registry, query));
  }

  resolve(registry: Sequence<E>, query: E): Sequence<E> {
    const key = hashResolutionKey(registry, query);
    const cached = this.store.get(key);
    if (cached) return cached;

    const ancestors = resolveAncestors(registry, query, this.derivesFrom);
    this.store.set(key, ancestors);
    return ancestors;
  }

  clear(): void {
    this.store.clear();
  }
}
