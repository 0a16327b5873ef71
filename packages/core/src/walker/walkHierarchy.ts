import type { Entity } from "../hierarchy/types.js";
import type { Sequence } from "../sequence/index.js";

export type VisitFn<E, I> = (entity: E, instance: I) => void;

/**
 * Call `visit` once per ancestor, in sequence order.
 */
export function walkHierarchy<E, I>(
  ancestors: Sequence<E>,
  instance: I,
  visit: VisitFn<E, I>
): void {
  for (const entity of ancestors) {
    visit(entity, instance);
  }
}

export type NarrowedVisitFn<T> = (entity: Entity<T>, view: T) => void;

export interface WalkNarrowedOptions<T> {
  /** Called for each ancestor the instance does not narrow to */
  onSkip?: (entity: Entity<T>) => void;
}

/**
 * Like `walkHierarchy`, but each step first views `instance` through the
 * ancestor's shape. Steps whose narrowing fails are skipped and the walk
 * moves on; they are never an error.
 */
export function walkNarrowed<T>(
  ancestors: Sequence<Entity<T>>,
  instance: unknown,
  visit: NarrowedVisitFn<T>,
  options: WalkNarrowedOptions<T> = {}
): void {
  walkHierarchy(ancestors, instance, (entity, value) => {
    const view = entity.narrow(value);
    if (view.success) {
      visit(entity, view.data);
    } else {
      options.onSkip?.(entity);
    }
  });
}
