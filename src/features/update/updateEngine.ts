// features/update/updateEngine
// Cascading update: refreshes every instance of a template in app screens and in other
// templates, then repeats for each template that was touched.

import * as path from 'path';
import type { NodeId } from '../../host/hostTree';
import { CascadeAbortedError, TemplateNotFoundError, ViewSyncError, toViewSyncError } from '../../utils/errors';
import { logLine, logProcessCompletion, logWarning } from '../../utils/logger';
import { findTopInstances } from './findInstances';
import type { DiscoveredInstance } from './findInstances';
import { MutatedContainerSet } from './mutatedContainers';
import { syncInstance } from './syncEngine';
import type { SyncDeps } from './syncEngine';

export type CascadeResult =
    | { status: 'updated' | 'unchanged'; kind: string; mutated: MutatedContainerSet }
    | { status: 'error'; kind: string; error: ViewSyncError; mutated: MutatedContainerSet };

interface CascadeContext {
    // Kinds whose cascade has started; never recursed into twice.
    cascading: Set<string>;
    // Kinds on the current recursion path; never a sync target.
    active: Set<string>;
    synced: Set<NodeId>;
    mutated: MutatedContainerSet;
}

function syncDiscovered(kind: string, instances: DiscoveredInstance[], deps: SyncDeps, context: CascadeContext): number {
    let count = 0;
    for (const instance of instances) {
        if (context.synced.has(instance.id)) continue;
        context.synced.add(instance.id);
        const result = syncInstance(kind, instance.id, deps);
        if (result.status === 'error') throw result.error;
        count++;
    }
    return count;
}

function updateScreens(kind: string, deps: SyncDeps, context: CascadeContext): void {
    const { host, registry, memory, configuration } = deps;
    for (const screen of registry.listAppScreens(configuration.get('templateListKey'))) {
        const lease = memory.acquireScreen(screen);
        try {
            const instances = findTopInstances(host, lease.screen, kind);
            if (instances.length === 0) continue;
            lease.keep();
            context.mutated.add({ id: lease.screen, name: screen.name, role: 'screen', backingPath: screen.backingPath });
            const count = syncDiscovered(kind, instances, deps, context);
            logLine('CASCADE', `${kind}: synced ${count} instance(s) in screen ${screen.name} (${path.basename(screen.backingPath)})`);
        } finally {
            lease.release();
        }
    }
}

function updateEmbeddingTemplates(kind: string, deps: SyncDeps, context: CascadeContext): void {
    const { host, registry, memory } = deps;
    for (const template of registry.list()) {
        if (context.active.has(template.kind)) {
            if (template.kind !== kind) logLine('CASCADE', `${template.kind} is being cascaded; skipped as a target of ${kind}`);
            continue;
        }
        const lease = memory.acquire(template.kind);
        let touched = false;
        try {
            const instances = findTopInstances(host, lease.screen, kind);
            if (instances.length === 0) continue;
            touched = true;
            lease.keep();
            context.mutated.add({ id: lease.screen, name: template.kind, role: 'template', backingPath: template.backingPath });
            const count = syncDiscovered(kind, instances, deps, context);
            logLine('CASCADE', `${kind}: synced ${count} instance(s) in template ${template.kind}`);
        } finally {
            lease.release();
        }
        if (!touched) continue;
        if (context.cascading.has(template.kind)) {
            logWarning('CASCADE', `${template.kind} already cascading; not recursing again from ${kind}`);
            continue;
        }
        try {
            runCascade(template.kind, deps, context);
        } catch (error) {
            if (error instanceof CascadeAbortedError) throw error;
            throw new CascadeAbortedError(template.kind, toViewSyncError(error, 'cascadeUpdate'));
        }
    }
}

function runCascade(kind: string, deps: SyncDeps, context: CascadeContext): void {
    if (!deps.registry.resolves(kind)) throw new TemplateNotFoundError(kind);
    context.cascading.add(kind);
    context.active.add(kind);
    logLine('CASCADE', `Update based on template -> ${kind}`);
    try {
        updateScreens(kind, deps, context);
        updateEmbeddingTemplates(kind, deps, context);
    } finally {
        context.active.delete(kind);
    }
}

export function cascadeUpdate(kind: string, deps: SyncDeps): CascadeResult {
    const context: CascadeContext = {
        cascading: new Set<string>(),
        active: new Set<string>(),
        synced: new Set<NodeId>(),
        mutated: new MutatedContainerSet()
    };
    try {
        runCascade(kind, deps, context);
        const status = context.mutated.size > 0 ? 'updated' : 'unchanged';
        if (status === 'unchanged') {
            logLine('CASCADE', `No instances of ${kind} found.`);
            logProcessCompletion('cascadeUpdate:empty', 3);
        } else {
            logProcessCompletion('cascadeUpdate');
        }
        return { status, kind, mutated: context.mutated };
    } catch (error) {
        const failure = toViewSyncError(error, 'cascadeUpdate');
        logWarning('CASCADE', `Cascade for ${kind} failed: ${failure.message}`);
        logProcessCompletion('cascadeUpdate', 1);
        return { status: 'error', kind, error: failure, mutated: context.mutated };
    }
}
