// src/core/obj/linearize.ts
// C3 merge used to order a class before its ancestors

/**
 * Merge sequences C3-style: repeatedly take the head of the first sequence
 * that appears in no other sequence's tail, drop it everywhere, and go on
 * until every sequence is empty. Returns null when no head qualifies.
 */
export function c3Merge<T>(sequences: readonly (readonly T[])[]): T[] | null {
  const pending = sequences.map((s) => [...s]).filter((s) => s.length > 0);
  const result: T[] = [];

  while (pending.length > 0) {
    let chosen: T | undefined;
    let found = false;
    for (const seq of pending) {
      const head = seq[0];
      if (!pending.some((other) => other.indexOf(head, 1) > 0)) {
        chosen = head;
        found = true;
        break;
      }
    }
    if (!found || chosen === undefined) return null;

    result.push(chosen);
    for (let i = pending.length - 1; i >= 0; i--) {
      const seq = pending[i];
      if (seq[0] === chosen) seq.shift();
      if (seq.length === 0) pending.splice(i, 1);
    }
  }

  return result;
}

/**
 * Linearize `self` given the already-linearized orders of its direct
 * parents. The result starts with `self`.
 */
export function c3Linearize<T>(
  self: T,
  directParents: readonly T[],
  linearizationOf: (parent: T) => readonly T[]
): T[] | null {
  const merged = c3Merge([...directParents.map(linearizationOf), directParents]);
  return merged ? [self, ...merged] : null;
}
