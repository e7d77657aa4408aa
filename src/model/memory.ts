import type { GameEvent } from './event.js';

export type SourceType = 'observation' | 'hearsay';

/**
 * How much an agent trusts a memory. Observations start as FACT and hearsay as
 * UNCERTAIN; VERIFIED and DISPROVED are only reached through `reviseCertainty`.
 */
export type Certainty = 'FACT' | 'UNCERTAIN' | 'VERIFIED' | 'DISPROVED';

export type Corroboration = 'corroborated' | 'contradicted';

export interface MemoryItem {
  // Shared with every other memory derived from the same event; never copied.
  readonly event: GameEvent;
  readonly sourceType: SourceType;
  readonly sourceId: string | null;
  readonly certainty: Certainty;
}

export function initialCertainty(sourceType: SourceType): Certainty {
  return sourceType === 'observation' ? 'FACT' : 'UNCERTAIN';
}

export function createMemoryItem(event: GameEvent, sourceType: SourceType, sourceId?: string): MemoryItem {
  if (sourceType === 'hearsay' && !sourceId) {
    throw new Error(`Hearsay about event #${event.seq} needs a source id`);
  }
  if (sourceType === 'observation' && sourceId !== undefined) {
    throw new Error(`Observation of event #${event.seq} cannot carry a source id`);
  }
  return Object.freeze({
    event,
    sourceType,
    sourceId: sourceId ?? null,
    certainty: initialCertainty(sourceType),
  });
}

/**
 * Next certainty for a memory once other evidence corroborates or contradicts it.
 * Only UNCERTAIN moves; FACT is never downgraded and VERIFIED/DISPROVED are final.
 */
export function nextCertainty(current: Certainty, evidence: Corroboration): Certainty {
  if (current !== 'UNCERTAIN') return current;
  return evidence === 'corroborated' ? 'VERIFIED' : 'DISPROVED';
}

export function reviseCertainty(item: MemoryItem, evidence: Corroboration): MemoryItem {
  const certainty = nextCertainty(item.certainty, evidence);
  if (certainty === item.certainty) return item;
  return Object.freeze({ ...item, certainty });
}
