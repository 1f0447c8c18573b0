import pLimit from 'p-limit';

/**
 * Runs a unit of store work. The store-level gate admits one writer at a
 * time; inside a transaction the repositories use `passThrough` because the
 * transaction already holds the gate.
 */
export type WriteGuard = <T>(work: () => Promise<T>) => Promise<T>;

export function createWriteGate(): WriteGuard {
  const limit = pLimit(1);
  return <T>(work: () => Promise<T>) => limit(work);
}

export const passThrough: WriteGuard = <T>(work: () => Promise<T>) => work();
