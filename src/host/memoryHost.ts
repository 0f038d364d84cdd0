// host/memoryHost
// In-process object tree built from serialisable screen definitions.
// "Disk" is a map of backing path -> definition; loading instantiates nodes, save writes back.

import type { HostNodeType, HostTree, NodeId, NodeProperties, NodePropertyKey, Rect, UpdateSuppression } from './hostTree';
import type { PersistenceService } from './persistence';
import type { MutatedContainer } from '../features/update/mutatedContainers';

export interface NodeDefinition {
  type: 'group' | 'control';
  rect: Rect;
  properties?: NodeProperties;
  children?: NodeDefinition[];
}

export interface CardDefinition {
  properties?: NodeProperties;
  children?: NodeDefinition[];
}

export interface ScreenDefinition {
  name: string;
  rect?: Rect;
  cards: CardDefinition[];
  backgrounds?: NodeDefinition[];
}

export interface DispatchedMessage {
  target: NodeId;
  message: string;
}

interface MemoryNode {
  id: NodeId;
  type: HostNodeType;
  parent: NodeId | undefined;
  screen: NodeId;
  children: NodeId[];
  rect: Rect;
  properties: NodeProperties;
  cards: NodeId[];
  backgrounds: NodeId[];
}

const DEFAULT_SCREEN_RECT: Rect = { left: 0, top: 0, width: 800, height: 600 };

const cloneRect = (rect: Rect): Rect => ({ left: rect.left, top: rect.top, width: rect.width, height: rect.height });

export class MemoryHost implements HostTree, PersistenceService {
  readonly dispatched: DispatchedMessage[] = [];
  readonly saved: string[] = [];
  private readonly disk = new Map<string, ScreenDefinition>();
  private readonly nodes = new Map<NodeId, MemoryNode>();
  private readonly screens = new Map<string, NodeId>();
  private suppression: UpdateSuppression = { redraw: false, messages: false };
  private nextId = 1;

  constructor(files: Record<string, ScreenDefinition> = {}) {
    for (const [backingPath, definition] of Object.entries(files)) {
      this.disk.set(backingPath, definition);
    }
  }

  writeFile(backingPath: string, definition: ScreenDefinition): void {
    this.disk.set(backingPath, definition);
  }

  readFile(backingPath: string): ScreenDefinition | undefined {
    return this.disk.get(backingPath);
  }

  loadedScreenNames(): string[] {
    return Array.from(this.screens.keys());
  }

  // Depth-first search by name under any node (screen, card or group).
  findByName(root: NodeId, name: string): NodeId | undefined {
    const node = this.node(root);
    const pending = [...node.backgrounds, ...node.cards, ...node.children];
    while (pending.length > 0) {
      const current = pending.shift();
      if (current === undefined) continue;
      const candidate = this.node(current);
      if (candidate.properties.name === name) return current;
      pending.push(...candidate.children);
    }
    return undefined;
  }

  getNodeType(id: NodeId): HostNodeType {
    return this.node(id).type;
  }

  getParent(id: NodeId): NodeId | undefined {
    return this.node(id).parent;
  }

  getOwningScreen(id: NodeId): NodeId {
    return this.node(id).screen;
  }

  listChildren(id: NodeId): NodeId[] {
    return [...this.node(id).children];
  }

  listCards(screen: NodeId): NodeId[] {
    return [...this.screenNode(screen).cards];
  }

  listBackgroundGroups(screen: NodeId): NodeId[] {
    return [...this.screenNode(screen).backgrounds];
  }

  getRect(id: NodeId): Rect {
    const node = this.node(id);
    if (node.type === 'card') {
      const screenRect = this.node(node.screen).rect;
      return { left: 0, top: 0, width: screenRect.width, height: screenRect.height };
    }
    return cloneRect(node.rect);
  }

  setRect(id: NodeId, rect: Rect): void {
    const node = this.node(id);
    const target = node.type === 'card' ? this.node(node.screen) : node;
    target.rect = cloneRect(rect);
  }

  getProperty<K extends NodePropertyKey>(id: NodeId, key: K): NodeProperties[K] {
    return this.node(id).properties[key];
  }

  setProperty<K extends NodePropertyKey>(id: NodeId, key: K, value: NodeProperties[K]): void {
    const properties = this.node(id).properties;
    if (value === undefined) {
      delete properties[key];
    } else {
      properties[key] = value;
    }
  }

  createGroup(parent: NodeId): NodeId {
    const owner = this.node(parent);
    if (owner.type !== 'card' && owner.type !== 'group') {
      throw new Error(`cannot create a group inside a ${owner.type}`);
    }
    const group = this.addNode('group', owner.id, owner.screen, { left: 0, top: 0, width: 0, height: 0 }, {});
    owner.children.push(group.id);
    return group.id;
  }

  copyControl(source: NodeId, target: NodeId): NodeId {
    const original = this.node(source);
    const destination = this.node(target);
    if (original.type !== 'control' && original.type !== 'group') {
      throw new Error(`cannot copy a ${original.type}`);
    }
    if (destination.type !== 'card' && destination.type !== 'group') {
      throw new Error(`cannot copy into a ${destination.type}`);
    }
    const copy = this.instantiate(this.serializeNode(original), destination.id, destination.screen);
    destination.children.push(copy);
    return copy;
  }

  deleteNode(id: NodeId): void {
    const node = this.node(id);
    if (node.type === 'screen' || node.type === 'card') {
      throw new Error(`cannot delete a ${node.type}`);
    }
    if (node.parent !== undefined) {
      const parent = this.node(node.parent);
      parent.children = parent.children.filter(child => child !== id);
      parent.backgrounds = parent.backgrounds.filter(child => child !== id);
    }
    this.forget(id);
  }

  findScreen(name: string): NodeId | undefined {
    return this.screens.get(name);
  }

  loadScreen(backingPath: string): NodeId {
    const definition = this.disk.get(backingPath);
    if (!definition) {
      throw new Error(`no screen file at ${backingPath}`);
    }
    const existing = this.screens.get(definition.name);
    if (existing !== undefined) return existing;

    const screen = this.addNode('screen', undefined, '', cloneRect(definition.rect ?? DEFAULT_SCREEN_RECT), { name: definition.name });
    screen.screen = screen.id;
    for (const background of definition.backgrounds ?? []) {
      screen.backgrounds.push(this.instantiate(background, screen.id, screen.id));
    }
    for (const cardDefinition of definition.cards) {
      const card = this.addNode('card', screen.id, screen.id, { left: 0, top: 0, width: 0, height: 0 }, { ...cardDefinition.properties });
      for (const child of cardDefinition.children ?? []) {
        card.children.push(this.instantiate(child, card.id, screen.id));
      }
      screen.cards.push(card.id);
    }
    this.screens.set(definition.name, screen.id);
    return screen.id;
  }

  unloadScreen(screen: NodeId): void {
    const node = this.screenNode(screen);
    const name = node.properties.name;
    this.forget(screen);
    if (name !== undefined) this.screens.delete(name);
  }

  getUpdateSuppression(): UpdateSuppression {
    return { ...this.suppression };
  }

  setUpdateSuppression(state: UpdateSuppression): void {
    this.suppression = { ...state };
  }

  dispatch(target: NodeId, message: string): void {
    this.node(target);
    this.dispatched.push({ target, message });
  }

  save(container: MutatedContainer): void {
    const screen = this.node(container.id).screen;
    this.disk.set(container.backingPath, this.serializeScreen(screen));
    this.saved.push(container.backingPath);
  }

  serializeScreen(screen: NodeId): ScreenDefinition {
    const node = this.screenNode(screen);
    return {
      name: node.properties.name ?? '',
      rect: cloneRect(node.rect),
      backgrounds: node.backgrounds.map(id => this.serializeNode(this.node(id))),
      cards: node.cards.map(id => {
        const card = this.node(id);
        return { properties: { ...card.properties }, children: card.children.map(child => this.serializeNode(this.node(child))) };
      })
    };
  }

  private serializeNode(node: MemoryNode): NodeDefinition {
    const definition: NodeDefinition = {
      type: node.type === 'group' ? 'group' : 'control',
      rect: cloneRect(node.rect),
      properties: { ...node.properties }
    };
    if (node.type === 'group') {
      definition.children = node.children.map(child => this.serializeNode(this.node(child)));
    }
    return definition;
  }

  private instantiate(definition: NodeDefinition, parent: NodeId, screen: NodeId): NodeId {
    const node = this.addNode(definition.type, parent, screen, cloneRect(definition.rect), { ...definition.properties });
    if (definition.type === 'group') {
      for (const child of definition.children ?? []) {
        node.children.push(this.instantiate(child, node.id, screen));
      }
    }
    return node.id;
  }

  private addNode(type: HostNodeType, parent: NodeId | undefined, screen: NodeId, rect: Rect, properties: NodeProperties): MemoryNode {
    const node: MemoryNode = {
      id: `${type}-${this.nextId++}`,
      type,
      parent,
      screen,
      children: [],
      rect,
      properties,
      cards: [],
      backgrounds: []
    };
    this.nodes.set(node.id, node);
    return node;
  }

  private forget(id: NodeId): void {
    const node = this.nodes.get(id);
    if (!node) return;
    for (const child of [...node.children, ...node.cards, ...node.backgrounds]) this.forget(child);
    this.nodes.delete(id);
  }

  private node(id: NodeId): MemoryNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`unknown node ${id}`);
    return node;
  }

  private screenNode(id: NodeId): MemoryNode {
    const node = this.node(id);
    if (node.type !== 'screen') throw new Error(`${id} is not a screen`);
    return node;
  }
}
