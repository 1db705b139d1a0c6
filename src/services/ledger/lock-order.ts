/**
 * Total order over resource ids. Any unit of work that locks more than one
 * resource takes the locks in this order, so two units locking an overlapping
 * set always queue on the same first resource and cannot wait on each other.
 */
export const lockOrder = (ids: readonly string[]): string[] =>
  [...new Set(ids)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

/**
 * Lock every id in lockOrder and return what each lock call yielded, keyed by id
 */
export const lockInOrder = async <R>(
  ids: readonly string[],
  lock: (id: string) => Promise<R>
): Promise<Map<string, R>> => {
  const acquired = new Map<string, R>();
  for (const id of lockOrder(ids)) {
    acquired.set(id, await lock(id));
  }
  return acquired;
};
