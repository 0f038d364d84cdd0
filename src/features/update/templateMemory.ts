// features/update/templateMemory
// Keeps template (and screen) definitions resident while they are read or mutated.
//
// Loads are counted per definition name: the first lease notes whether the definition
// was already in memory, and the last release unloads it only when a lease loaded it.
// A lease that mutated its definition calls keep() so the caller can persist it.

import * as path from 'path';
import type { HostTree, NodeId } from '../../host/hostTree';
import type { ScreenEntry } from '../../host/manifest';
import { TemplateNotFoundError, guardHost } from '../../utils/errors';
import { logLine, logWarning } from '../../utils/logger';
import type { TemplateRegistry } from './templateRegistry';

export interface Lease {
  readonly name: string;
  readonly screen: NodeId;
  keep(): void;
  release(): void;
}

export interface LoadResult {
  screen: NodeId;
  wasAlreadyResident: boolean;
}

interface ResidencyEntry {
  screen: NodeId;
  count: number;
  loadedHere: boolean;
  kept: boolean;
}

export class TemplateMemoryManager {
  private readonly entries = new Map<string, ResidencyEntry>();

  constructor(private readonly host: HostTree, private readonly registry: TemplateRegistry) {}

  isResident(kind: string): boolean {
    return this.host.findScreen(kind) !== undefined;
  }

  ensureLoaded(kind: string): LoadResult {
    const entry = this.registry.lookup(kind);
    if (!entry) throw new TemplateNotFoundError(kind);
    return this.load(kind, entry.backingPath);
  }

  release(kind: string, shouldUnload: boolean): void {
    if (!shouldUnload) return;
    const leases = this.activeLeaseCount(kind);
    if (leases > 0) {
      logWarning('TEMPLATE-MEMORY', `${kind} is held by ${leases} lease(s); not unloading`);
      return;
    }
    const screen = this.host.findScreen(kind);
    if (screen !== undefined) this.unload(kind, screen);
  }

  acquire(kind: string): Lease {
    const entry = this.registry.lookup(kind);
    if (!entry) throw new TemplateNotFoundError(kind);
    return this.lease(kind, entry.backingPath);
  }

  acquireScreen(screen: ScreenEntry): Lease {
    return this.lease(screen.name, screen.backingPath);
  }

  withTemplate<T>(kind: string, fn: (screen: NodeId) => T): T {
    const lease = this.acquire(kind);
    try {
      return fn(lease.screen);
    } finally {
      lease.release();
    }
  }

  activeLeaseCount(name: string): number {
    return this.entries.get(name)?.count ?? 0;
  }

  private load(name: string, backingPath: string): LoadResult {
    const existing = this.host.findScreen(name);
    if (existing !== undefined) {
      return { screen: existing, wasAlreadyResident: true };
    }
    const screen = guardHost('loadScreen', undefined, () => this.host.loadScreen(backingPath));
    logLine('TEMPLATE-MEMORY', `Loaded ${name} from ${path.basename(backingPath)}`);
    return { screen, wasAlreadyResident: false };
  }

  private unload(name: string, screen: NodeId): void {
    guardHost('unloadScreen', screen, () => this.host.unloadScreen(screen));
    logLine('TEMPLATE-MEMORY', `Unloaded ${name}`);
  }

  private lease(name: string, backingPath: string): Lease {
    let entry = this.entries.get(name);
    if (!entry) {
      const loaded = this.load(name, backingPath);
      entry = { screen: loaded.screen, count: 0, loadedHere: !loaded.wasAlreadyResident, kept: false };
      this.entries.set(name, entry);
    }
    entry.count++;
    const held = entry;
    let released = false;
    return {
      name,
      screen: held.screen,
      keep: () => { held.kept = true; },
      release: () => {
        if (released) return;
        released = true;
        held.count--;
        if (held.count > 0) return;
        this.entries.delete(name);
        if (held.loadedHere && !held.kept) this.unload(name, held.screen);
      }
    };
  }
}
