// index
// Wires registry, template memory and configuration around a host and exposes the sync operations.

import type { HostTree, NodeId } from './host/hostTree';
import type { ManifestService } from './host/manifest';
import { saveMutatedContainers } from './host/persistence';
import type { PersistenceService } from './host/persistence';
import { createInstance } from './features/file-creation';
import type { CreateInstanceOptions, CreateInstanceResult } from './features/file-creation';
import { previewSync } from './features/diff/syncPreview';
import type { SyncPreview } from './features/diff/diffNavigationTypes';
import { findInstancesInScreens, findTopInstances } from './features/update/findInstances';
import type { DiscoveredInstance, ScreenInstances } from './features/update/findInstances';
import { findAllEmbeddingTemplates, findEmbeddingTemplates } from './features/update/templateHierarchy';
import type { EmbeddingTemplate, HierarchySearch } from './features/update/templateHierarchy';
import { TemplateMemoryManager } from './features/update/templateMemory';
import { TemplateRegistry } from './features/update/templateRegistry';
import { clearInstance, syncInstance } from './features/update/syncEngine';
import type { SyncDeps, SyncResult } from './features/update/syncEngine';
import { cascadeUpdate } from './features/update/updateEngine';
import type { CascadeResult } from './features/update/updateEngine';
import type { MutatedContainer } from './features/update/mutatedContainers';
import { getConfiguration } from './utils/configuration';
import type { ViewSyncSettingsOverrides } from './utils/configuration';
import { initializeLogger } from './utils/logger';
import type { LogChannel } from './utils/logger';

export * from './host/hostTree';
export * from './host/manifest';
export * from './host/memoryHost';
export * from './host/persistence';
export * from './utils/errors';
export * from './utils/configuration';
export * from './utils/logger';
export { getViewKind, isViewInstance } from './utils/templateDetection';
export type { ViewNode } from './utils/templateDetection';
export { withSuppressedUpdates } from './utils/updateSuppression';
export { TemplateRegistry } from './features/update/templateRegistry';
export { TemplateMemoryManager } from './features/update/templateMemory';
export type { Lease, LoadResult } from './features/update/templateMemory';
export { MutatedContainerSet } from './features/update/mutatedContainers';
export type { MutatedContainer } from './features/update/mutatedContainers';
export type { ContentItem, ContentPlan } from './features/update/contentPlan';
export type { DiffNavigationEntry, LineRange, SyncPreview } from './features/diff/diffNavigationTypes';
export { describeInstanceContent } from './features/diff/syncPreview';
export type {
  CascadeResult,
  CreateInstanceOptions,
  CreateInstanceResult,
  DiscoveredInstance,
  EmbeddingTemplate,
  HierarchySearch,
  ScreenInstances,
  SyncDeps,
  SyncResult
};

export interface ViewSyncOptions {
  host: HostTree;
  manifest: ManifestService;
  settings?: ViewSyncSettingsOverrides;
  channel?: LogChannel;
}

export interface ViewSync {
  readonly deps: SyncDeps;
  resolves(kind: string): boolean;
  findTopInstances(container: NodeId, kindFilter?: string): DiscoveredInstance[];
  findInstancesInScreens(kindFilter?: string): ScreenInstances[];
  syncInstance(kind: string, instance: NodeId): SyncResult;
  clearInstance(instance: NodeId): number;
  createInstance(kind: string, parent: NodeId, options?: CreateInstanceOptions): CreateInstanceResult;
  cascadeUpdate(kind: string): CascadeResult;
  previewSync(kind: string, instance: NodeId): SyncPreview;
  findEmbeddingTemplates(kind: string): EmbeddingTemplate[];
  findAllEmbeddingTemplates(kind: string): HierarchySearch;
  saveMutated(mutated: Iterable<MutatedContainer>, persistence: PersistenceService): number;
}

export function createViewSync(options: ViewSyncOptions): ViewSync {
  initializeLogger(options.channel);
  const configuration = getConfiguration(options.settings);
  const registry = new TemplateRegistry(options.manifest);
  const memory = new TemplateMemoryManager(options.host, registry);
  const deps: SyncDeps = { host: options.host, registry, memory, configuration };

  return {
    deps,
    resolves: kind => registry.resolves(kind),
    findTopInstances: (container, kindFilter) => findTopInstances(options.host, container, kindFilter),
    findInstancesInScreens: kindFilter => findInstancesInScreens(deps, configuration.get('templateListKey'), kindFilter),
    syncInstance: (kind, instance) => syncInstance(kind, instance, deps),
    clearInstance: instance => clearInstance(options.host, instance),
    createInstance: (kind, parent, createOptions) => createInstance(kind, parent, deps, createOptions),
    cascadeUpdate: kind => cascadeUpdate(kind, deps),
    previewSync: (kind, instance) => previewSync(kind, instance, deps),
    findEmbeddingTemplates: kind => findEmbeddingTemplates(kind, deps),
    findAllEmbeddingTemplates: kind => findAllEmbeddingTemplates(kind, deps),
    saveMutated: (mutated, persistence) => saveMutatedContainers(mutated, persistence)
  };
}
