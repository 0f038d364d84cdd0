import type { HostTree, NodeId, Rect } from '../host/hostTree';
import { centerOf } from '../host/hostTree';
import { TemplateNotFoundError, guardHost, toViewSyncError } from '../utils/errors';
import type { ViewSyncError } from '../utils/errors';
import { logLine, logProcessCompletion } from '../utils/logger';
import { withSuppressedUpdates } from '../utils/updateSuppression';
import { syncInstance } from './update/syncEngine';
import type { SyncDeps } from './update/syncEngine';

export interface CreateInstanceOptions {
  rect?: Rect;
  name?: string;
}

export type CreateInstanceResult =
  | { status: 'created'; instance: NodeId }
  // The tagged group exists but could not be populated.
  | { status: 'partial'; instance: NodeId; error: ViewSyncError }
  | { status: 'error'; error: ViewSyncError };

/**
 * Resolves where a new group goes: screens place it on their first card.
 */
function resolveGroupParent(host: HostTree, parent: NodeId): NodeId {
  if (host.getNodeType(parent) !== 'screen') return parent;
  const card = host.listCards(parent)[0];
  if (card === undefined) {
    throw new Error(`screen ${parent} has no card to hold the instance`);
  }
  return card;
}

/**
 * A square of `size` centred on the parent's logical centre. For a card or screen that is
 * the middle of its own rect, so the result does not depend on where the window sits.
 */
export function defaultInstanceRect(host: HostTree, parent: NodeId, size: number): Rect {
  const center = centerOf(host.getRect(parent));
  const half = Math.round(size / 2);
  return { left: center.x - half, top: center.y - half, width: size, height: size };
}

/**
 * Creates a new instance of `kind` inside `parent` and fills it from the template.
 */
export function createInstance(kind: string, parent: NodeId, deps: SyncDeps, options: CreateInstanceOptions = {}): CreateInstanceResult {
  const { host, registry, configuration } = deps;
  if (!registry.resolves(kind)) {
    logProcessCompletion('createInstance:not-template', 1);
    return { status: 'error', error: new TemplateNotFoundError(kind) };
  }

  let instance: NodeId;
  try {
    instance = withSuppressedUpdates(host, () => {
      const groupParent = guardHost('resolveParent', parent, () => resolveGroupParent(host, parent));
      const group = guardHost('createGroup', groupParent, () => host.createGroup(groupParent));
      guardHost('setProperty', group, () => {
        host.setProperty(group, 'viewKind', kind);
        host.setProperty(group, 'showBorder', false);
        host.setProperty(group, 'margins', 0);
        host.setProperty(group, 'opaque', false);
        host.setProperty(group, 'clipsToRect', true);
        host.setProperty(group, 'selectGroupedControls', false);
        if (options.name) host.setProperty(group, 'name', options.name);
        host.setRect(group, options.rect ?? defaultInstanceRect(host, groupParent, configuration.get('defaultInstanceSize')));
      });
      return group;
    });
  } catch (error) {
    const failure = toViewSyncError(error, 'createInstance', parent);
    logProcessCompletion('createInstance', 1);
    return { status: 'error', error: failure };
  }

  logLine('CREATE', `Created ${kind} instance ${instance} in ${parent}`);
  const synced = syncInstance(kind, instance, deps);
  if (synced.status === 'error') {
    logProcessCompletion('createInstance:partial', 1);
    return { status: 'partial', instance, error: synced.error };
  }
  logProcessCompletion('createInstance');
  return { status: 'created', instance };
}
