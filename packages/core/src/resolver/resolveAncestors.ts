import type { DerivationRelation } from "../hierarchy/types.js";
import {
  append,
  emptySequence,
  filter,
  isEmpty,
  maxBy,
} from "../sequence/index.js";
import type { Sequence } from "../sequence/index.js";

export type SelectionStep<E> = {
  /** The most ancestral candidate chosen at this step */
  selected: E;
  /** Candidates still waiting, before `selected` is removed */
  remaining: Sequence<E>;
};

export interface ResolveOptions<E> {
  onSelect?: (step: SelectionStep<E>) => void;
}

/**
 * Order the registered ancestors of `query` from most-base to most-derived.
 *
 * The registry is first narrowed to entries `U` with `derivesFrom(U, query)`,
 * registry order and duplicates preserved. Then, selection-sort style, the
 * most ancestral remaining candidate is picked with `maxBy`, every entry
 * identical to it is dropped from the candidates, and it is appended to the
 * output, until no candidates are left.
 *
 * Ties between candidates the relation does not order fall out of `maxBy`'s
 * right fold over registry order, so the output is deterministic for a
 * given registry. A query with no registered ancestors (not even itself)
 * yields an empty sequence.
 */
export function resolveAncestors<E>(
  registry: Sequence<E>,
  query: E,
  derivesFrom: DerivationRelation<E>,
  options: ResolveOptions<E> = {}
): Sequence<E> {
  const isMoreAncestral = (left: E, right: E): boolean =>
    derivesFrom(left, right);

  let remaining = filter(registry, (candidate) => derivesFrom(candidate, query));
  let output = emptySequence<E>();

  while (!isEmpty(remaining)) {
    const selected = maxBy(remaining, isMoreAncestral);
    options.onSelect?.({ selected, remaining });
    remaining = filter(remaining, (candidate) => candidate !== selected);
    output = append(output, selected);
  }

  return output;
}
