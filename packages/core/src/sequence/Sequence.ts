import { EmptySequenceError, IndexOutOfRangeError } from "./errors.js";

/**
 * An ordered, immutable run of elements. Every operation below returns a new
 * array and leaves its input untouched.
 */
export type Sequence<T> = readonly T[];

export type Predicate<T> = (element: T) => boolean;

/**
 * Binary comparator for `maxBy`: returns true when `left` should win over
 * `right`.
 */
export type Comparator<T> = (left: T, right: T) => boolean;

export const emptySequence = <T>(): Sequence<T> => [];

export const isEmpty = <T>(seq: Sequence<T>): boolean => seq.length === 0;

export function append<T>(seq: Sequence<T>, element: T): Sequence<T> {
  return [...seq, element];
}

export function prepend<T>(element: T, seq: Sequence<T>): Sequence<T> {
  return [element, ...seq];
}

/**
 * @throws EmptySequenceError if `seq` has no elements
 */
export function dropFirst<T>(seq: Sequence<T>): Sequence<T> {
  if (isEmpty(seq)) {
    throw new EmptySequenceError("dropFirst");
  }
  return seq.slice(1);
}

/**
 * @throws IndexOutOfRangeError unless `0 <= index < seq.length`
 */
export function at<T>(seq: Sequence<T>, index: number): T {
  if (!Number.isInteger(index) || index < 0 || index >= seq.length) {
    throw new IndexOutOfRangeError(index, seq.length);
  }
  return seq[index];
}

export function filter<T>(seq: Sequence<T>, predicate: Predicate<T>): Sequence<T> {
  const kept: T[] = [];
  for (const element of seq) {
    if (predicate(element)) kept.push(element);
  }
  return kept;
}

/**
 * Select the winning element of `seq` under `comparator`.
 *
 * Defined as a right fold: the head is compared against the winner of the
 * tail, and kept only when `comparator(head, tailWinner)` holds. For
 * elements the comparator cannot order (false both ways) the tail winner is
 * returned, which means the earliest of a run of mutually incomparable
 * elements wins only if it beats the fold of the rest; callers rely on this
 * exact evaluation order for their tie-breaks.
 *
 * The fold is evaluated from the right end in a loop rather than by
 * recursion.
 *
 * @throws EmptySequenceError if `seq` has no elements
 */
export function maxBy<T>(seq: Sequence<T>, comparator: Comparator<T>): T {
  if (isEmpty(seq)) {
    throw new EmptySequenceError("maxBy");
  }
  let winner = at(seq, seq.length - 1);
  for (let i = seq.length - 2; i >= 0; i--) {
    const head = at(seq, i);
    if (comparator(head, winner)) {
      winner = head;
    }
  }
  return winner;
}
