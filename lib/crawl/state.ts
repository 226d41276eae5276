import type { StoredIdSource } from '../store';

/**
 * Derived from the store at start-up and then mutated only by the consumer.
 * It is never saved on its own: the store is the checkpoint.
 */
export interface CrawlState {
  nextId: number;
  knownIds: Set<number>;
  consecutiveMisses: number;
  stopRequested: boolean;
}

export function loadCrawlState(source: StoredIdSource, startOverride: number | null = null): CrawlState {
  const knownIds = new Set(source.readIds());
  let maxId = 0;
  for (const id of knownIds) {
    if (id > maxId) maxId = id;
  }
  return {
    nextId: startOverride !== null && startOverride > 0 ? startOverride : maxId + 1,
    knownIds,
    consecutiveMisses: 0,
    stopRequested: false
  };
}
