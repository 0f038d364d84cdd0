// features/update/syncEngine
// Replaces an instance's content with a fresh copy of its template.

import { COSMETIC_PROPERTIES } from '../../host/hostTree';
import type { HostTree, NodeId } from '../../host/hostTree';
import type { ViewSyncConfiguration } from '../../utils/configuration';
import { HostMutationError, TemplateNotFoundError, guardHost, toViewSyncError } from '../../utils/errors';
import type { ViewSyncError } from '../../utils/errors';
import { logLine, logProcessCompletion, logWarning } from '../../utils/logger';
import { withSuppressedUpdates } from '../../utils/updateSuppression';
import { planInstanceContent, templateCardOf } from './contentPlan';
import type { ContentPlan } from './contentPlan';
import type { TemplateMemoryManager } from './templateMemory';
import type { TemplateRegistry } from './templateRegistry';

export interface SyncDeps {
    host: HostTree;
    registry: TemplateRegistry;
    memory: TemplateMemoryManager;
    configuration: ViewSyncConfiguration;
}

export type SyncResult =
    | { status: 'updated'; instance: NodeId }
    | { status: 'error'; instance: NodeId; error: ViewSyncError };

export function clearInstance(host: HostTree, instance: NodeId): number {
    return withSuppressedUpdates(host, () => {
        const children = guardHost('listChildren', instance, () => host.listChildren(instance));
        for (const child of children) {
            guardHost('deleteNode', child, () => host.deleteNode(child));
        }
        return children.length;
    });
}

function tagInstance(host: HostTree, instance: NodeId, kind: string): void {
    guardHost('setProperty', instance, () => {
        host.setProperty(instance, 'viewKind', kind);
        host.setProperty(instance, 'selectGroupedControls', false);
        host.setProperty(instance, 'clipsToRect', true);
    });
}

function applyBehaviorAndCosmetics(host: HostTree, instance: NodeId, plan: ContentPlan): void {
    guardHost('setProperty', instance, () => {
        host.setProperty(instance, 'behavior', plan.behavior);
        for (const key of COSMETIC_PROPERTIES) {
            // Unset on the template means unset on the instance.
            host.setProperty(instance, key, plan.cosmetics[key]);
        }
    });
}

function populate(kind: string, instance: NodeId, plan: ContentPlan, deps: SyncDeps, syncing: readonly string[]): number {
    const { host } = deps;
    let copied = 0;
    for (const item of plan.items) {
        if (item.type === 'copy') {
            const copy = guardHost('copyControl', item.source, () => host.copyControl(item.source, instance));
            guardHost('setRect', copy, () => host.setRect(copy, item.rect));
            copied++;
            continue;
        }
        const nested = guardHost('createGroup', instance, () => host.createGroup(instance));
        guardHost('setProperty', nested, () => {
            if (item.name) host.setProperty(nested, 'name', item.name);
            host.setRect(nested, item.rect);
        });
        tagInstance(host, nested, item.kind);
        if (syncing.includes(item.kind)) {
            logWarning('VIEW-SYNC', `Nested ${item.kind} inside ${kind} would recurse into itself; left empty`);
            continue;
        }
        if (!deps.registry.resolves(item.kind)) {
            logWarning('VIEW-SYNC', `Nested ${item.kind} inside ${kind} has no template; left empty`);
            continue;
        }
        const nestedResult = syncInstance(item.kind, nested, deps, syncing);
        if (nestedResult.status === 'error') throw nestedResult.error;
        copied++;
    }
    return copied;
}

export function syncInstance(kind: string, instance: NodeId, deps: SyncDeps, syncing: readonly string[] = []): SyncResult {
    const { host, registry, memory, configuration } = deps;
    try {
        if (!registry.resolves(kind)) {
            throw new TemplateNotFoundError(kind);
        }
        if (host.getNodeType(instance) !== 'group') {
            throw new HostMutationError('syncInstance', instance, 'target is not a group');
        }
        const stack = [...syncing, kind];
        memory.withTemplate(kind, templateScreen => {
            const card = templateCardOf(host, templateScreen);
            if (card === undefined) {
                throw new HostMutationError('listCards', templateScreen, `template ${kind} has no card`);
            }
            withSuppressedUpdates(host, () => {
                const removed = clearInstance(host, instance);
                tagInstance(host, instance, kind);
                const plan = planInstanceContent(host, card, host.getRect(instance), {
                    includeNested: configuration.get('instantiateNestedViews')
                });
                applyBehaviorAndCosmetics(host, instance, plan);
                const added = populate(kind, instance, plan, deps, stack);
                logLine('VIEW-SYNC', `${kind} -> ${instance}: removed ${removed}, added ${added}`);
            });
        });

        const messages = configuration.get('lifecycleMessages');
        guardHost('dispatch', instance, () => {
            host.dispatch(instance, messages.instantiated);
            host.dispatch(instance, messages.resize);
        });
        if (syncing.length === 0) logProcessCompletion(`syncInstance:${kind}`);
        return { status: 'updated', instance };
    } catch (error) {
        const failure = toViewSyncError(error, 'syncInstance', instance);
        logWarning('VIEW-SYNC', `Failed syncing ${instance} to ${kind}: ${failure.message}`);
        if (syncing.length === 0) logProcessCompletion(`syncInstance:${kind}`, 1);
        return { status: 'error', instance, error: failure };
    }
}
