// features/update/templateHierarchy
// Utilities to discover templates that embed a template and walk that containment upward.

import type { HostTree } from '../../host/hostTree';
import type { TemplateEntry } from '../../host/manifest';
import { toViewSyncError } from '../../utils/errors';
import type { ViewSyncError } from '../../utils/errors';
import { logWarning } from '../../utils/logger';
import { findTopInstances } from './findInstances';
import type { DiscoveredInstance } from './findInstances';
import type { TemplateMemoryManager } from './templateMemory';
import type { TemplateRegistry } from './templateRegistry';

export interface EmbeddingTemplate {
  template: TemplateEntry;
  instances: DiscoveredInstance[];
}

export interface HierarchySearch {
  templates: TemplateEntry[];
  // Kinds whose embedding templates could not be searched; their ancestors are missing from `templates`.
  failures: { kind: string; error: ViewSyncError }[];
}

interface HierarchyDeps {
  host: HostTree;
  registry: TemplateRegistry;
  memory: TemplateMemoryManager;
}

export function findEmbeddingTemplates(kind: string, deps: HierarchyDeps): EmbeddingTemplate[] {
  const embedding: EmbeddingTemplate[] = [];
  for (const template of deps.registry.list()) {
    if (template.kind === kind) continue;
    const instances = deps.memory.withTemplate(template.kind, screen => findTopInstances(deps.host, screen, kind));
    if (instances.length > 0) embedding.push({ template, instances });
  }
  return embedding;
}

export function findAllEmbeddingTemplates(kind: string, deps: HierarchyDeps): HierarchySearch {
  const discovered: TemplateEntry[] = [];
  const failures: HierarchySearch['failures'] = [];
  const visited = new Set<string>([kind]);
  const queue: string[] = [kind];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) continue;
    try {
      for (const { template } of findEmbeddingTemplates(current, deps)) {
        if (!visited.has(template.kind)) {
          visited.add(template.kind);
          discovered.push(template);
          queue.push(template.kind);
        }
      }
    } catch (error) {
      const failure = toViewSyncError(error, 'findAllEmbeddingTemplates');
      failures.push({ kind: current, error: failure });
      logWarning('HIERARCHY', `Error while searching templates embedding ${current}`, failure);
    }
  }
  return { templates: discovered, failures };
}
