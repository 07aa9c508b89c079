/**
 * Walks an ordered list of alternatives and returns the first non-null result.
 *
 * `attempt` signals failure by returning null, so callers never need exceptions
 * for control flow. Returns null when every alternative fails.
 */
export function firstSuccess<T, R>(
  candidates: Iterable<T>,
  attempt: (candidate: T, index: number) => R | null
): R | null {
  let index = 0;
  for (const candidate of candidates) {
    const result = attempt(candidate, index);
    if (result !== null) {
      return result;
    }
    index++;
  }
  return null;
}
