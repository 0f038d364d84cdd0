// update/findInstances
// Finds the topmost embedded view instances inside a container without entering instances.

import type { HostTree, NodeId } from '../../host/hostTree';
import type { ScreenEntry } from '../../host/manifest';
import { classifyNode } from '../../utils/templateDetection';
import type { TemplateMemoryManager } from './templateMemory';
import type { TemplateRegistry } from './templateRegistry';

export interface DiscoveredInstance {
  id: NodeId;
  kind: string;
}

export interface ScreenInstances {
  screen: ScreenEntry;
  container: NodeId;
  instances: DiscoveredInstance[];
}

function scanRoots(host: HostTree, container: NodeId): NodeId[] {
  const type = host.getNodeType(container);
  if (type === 'screen') {
    const roots = [...host.listBackgroundGroups(container)];
    for (const card of host.listCards(container)) roots.push(...host.listChildren(card));
    return roots;
  }
  if (type === 'card' || type === 'group') {
    return host.listChildren(container);
  }
  return [];
}

export function findTopInstances(host: HostTree, container: NodeId, kindFilter?: string): DiscoveredInstance[] {
  const found: DiscoveredInstance[] = [];
  const visited = new Set<NodeId>();
  const queue: NodeId[] = scanRoots(host, container);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    const node = classifyNode(host, current);
    if (node.type === 'instance') {
      // Descent stops at every instance boundary, matching or not.
      if (!kindFilter || node.kind === kindFilter) found.push({ id: node.id, kind: node.kind });
      continue;
    }
    if (node.type === 'group') {
      queue.push(...host.listChildren(current));
    }
  }
  return found;
}

export function findInstancesInScreens(
  deps: { host: HostTree; registry: TemplateRegistry; memory: TemplateMemoryManager },
  templateListKey: string,
  kindFilter?: string
): ScreenInstances[] {
  const results: ScreenInstances[] = [];
  for (const screen of deps.registry.listAppScreens(templateListKey)) {
    const lease = deps.memory.acquireScreen(screen);
    try {
      const instances = findTopInstances(deps.host, lease.screen, kindFilter);
      if (instances.length > 0) results.push({ screen, container: lease.screen, instances });
    } finally {
      lease.release();
    }
  }
  return results;
}
