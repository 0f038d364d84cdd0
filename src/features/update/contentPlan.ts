// features/update/contentPlan
// Computes what an instance should contain from a template card, without touching the instance.

import { COSMETIC_PROPERTIES, translateRect } from '../../host/hostTree';
import type { CosmeticProperties, HostTree, NodeId, Rect } from '../../host/hostTree';
import { classifyNode } from '../../utils/templateDetection';

export type ContentItem =
  | { type: 'copy'; source: NodeId; rect: Rect }
  | { type: 'nested'; source: NodeId; kind: string; name: string | undefined; rect: Rect };

export interface ContentPlan {
  // The template card, or the sole wrapper group on it.
  root: NodeId;
  origin: { x: number; y: number };
  behavior: string | undefined;
  cosmetics: CosmeticProperties;
  // Restartable: every iteration re-reads the template.
  items: Iterable<ContentItem>;
}

function readCosmetics(host: HostTree, id: NodeId): CosmeticProperties {
  return {
    backgroundColor: host.getProperty(id, 'backgroundColor'),
    foregroundColor: host.getProperty(id, 'foregroundColor'),
    textFont: host.getProperty(id, 'textFont'),
    textSize: host.getProperty(id, 'textSize'),
    textStyle: host.getProperty(id, 'textStyle')
  };
}

const hasAnyCosmetic = (cosmetics: CosmeticProperties): boolean =>
  COSMETIC_PROPERTIES.some(key => cosmetics[key] !== undefined);

export function resolveEffectiveRoot(host: HostTree, card: NodeId): NodeId {
  if (host.getProperty(card, 'behavior') || hasAnyCosmetic(readCosmetics(host, card))) {
    return card;
  }
  const children = host.listChildren(card);
  if (children.length !== 1) return card;
  const only = classifyNode(host, children[0]);
  return only.type === 'group' ? only.id : card;
}

export function templateCardOf(host: HostTree, templateScreen: NodeId): NodeId | undefined {
  return host.listCards(templateScreen)[0];
}

export function planInstanceContent(
  host: HostTree,
  card: NodeId,
  instanceRect: Rect,
  options: { includeNested: boolean }
): ContentPlan {
  const root = resolveEffectiveRoot(host, card);
  const origin = root === card ? { x: 0, y: 0 } : { x: host.getRect(root).left, y: host.getRect(root).top };
  const dx = instanceRect.left - origin.x;
  const dy = instanceRect.top - origin.y;

  const items: Iterable<ContentItem> = {
    *[Symbol.iterator]() {
      for (const child of host.listChildren(root)) {
        const node = classifyNode(host, child);
        const rect = translateRect(host.getRect(child), dx, dy);
        if (node.type === 'control') {
          yield { type: 'copy', source: child, rect };
        } else if (node.type === 'instance' && options.includeNested) {
          yield { type: 'nested', source: child, kind: node.kind, name: host.getProperty(child, 'name'), rect };
        }
      }
    }
  };

  return {
    root,
    origin,
    behavior: host.getProperty(root, 'behavior') || undefined,
    cosmetics: readCosmetics(host, root),
    items
  };
}
