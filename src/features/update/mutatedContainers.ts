// features/update/mutatedContainers
// Containers touched by one cascade, keyed by container id.

import type { NodeId } from '../../host/hostTree';

export interface MutatedContainer {
  id: NodeId;
  name: string;
  role: 'screen' | 'template';
  backingPath: string;
}

export class MutatedContainerSet implements Iterable<MutatedContainer> {
  private readonly byId = new Map<NodeId, MutatedContainer>();

  add(container: MutatedContainer): boolean {
    if (this.byId.has(container.id)) return false;
    this.byId.set(container.id, container);
    return true;
  }

  has(id: NodeId): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.byId.size;
  }

  ids(): NodeId[] {
    return Array.from(this.byId.keys());
  }

  merge(other: MutatedContainerSet): void {
    for (const container of other) this.add(container);
  }

  [Symbol.iterator](): Iterator<MutatedContainer> {
    return this.byId.values();
  }
}
