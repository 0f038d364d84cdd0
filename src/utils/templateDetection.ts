// templateDetection
// Distinguishes embedded view instances from plain scaffolding groups and leaf controls.

import type { HostTree, NodeId } from '../host/hostTree';

export type ViewNode =
    | { type: 'instance'; id: NodeId; kind: string }
    | { type: 'group'; id: NodeId }
    | { type: 'control'; id: NodeId };

export function getViewKind(host: HostTree, id: NodeId): string | undefined {
    const kind = host.getProperty(id, 'viewKind');
    return kind && kind.trim().length > 0 ? kind : undefined;
}

export function classifyNode(host: HostTree, id: NodeId): ViewNode {
    if (host.getNodeType(id) !== 'group') {
        return { type: 'control', id };
    }
    const kind = getViewKind(host, id);
    return kind ? { type: 'instance', id, kind } : { type: 'group', id };
}

export function isViewInstance(host: HostTree, id: NodeId): boolean {
    return classifyNode(host, id).type === 'instance';
}
