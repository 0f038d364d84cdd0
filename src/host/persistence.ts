// host/persistence
// Hands the containers a cascade mutated to whatever saves them.

import type { MutatedContainer } from '../features/update/mutatedContainers';
import { guardHost } from '../utils/errors';
import { logLine } from '../utils/logger';

export interface PersistenceService {
  save(container: MutatedContainer): void;
}

export function saveMutatedContainers(mutated: Iterable<MutatedContainer>, persistence: PersistenceService): number {
  let saved = 0;
  for (const container of mutated) {
    guardHost('save', container.id, () => persistence.save(container));
    logLine('SAVE', `Saved ${container.role} ${container.name} -> ${container.backingPath}`);
    saved++;
  }
  return saved;
}
