// host/hostTree
// Contract of the GUI runtime object tree the sync engine issues commands against.

export type NodeId = string;

export type HostNodeType = 'screen' | 'card' | 'group' | 'control';

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface CosmeticProperties {
  backgroundColor?: string;
  foregroundColor?: string;
  textFont?: string;
  textSize?: number;
  textStyle?: string;
}

export const COSMETIC_PROPERTIES = [
  'backgroundColor',
  'foregroundColor',
  'textFont',
  'textSize',
  'textStyle'
] as const satisfies readonly (keyof CosmeticProperties)[];

export interface NodeProperties extends CosmeticProperties {
  name?: string;
  // Non-empty on a group that is an embedded view instance.
  viewKind?: string;
  behavior?: string;
  selectGroupedControls?: boolean;
  clipsToRect?: boolean;
  showBorder?: boolean;
  margins?: number;
  opaque?: boolean;
}

export type NodePropertyKey = keyof NodeProperties;

export interface UpdateSuppression {
  redraw: boolean;
  messages: boolean;
}

export interface HostTree {
  getNodeType(id: NodeId): HostNodeType;
  getParent(id: NodeId): NodeId | undefined;
  getOwningScreen(id: NodeId): NodeId;

  /** Direct children of a card or group, in layer order. */
  listChildren(id: NodeId): NodeId[];
  listCards(screen: NodeId): NodeId[];
  listBackgroundGroups(screen: NodeId): NodeId[];

  getRect(id: NodeId): Rect;
  setRect(id: NodeId, rect: Rect): void;
  getProperty<K extends NodePropertyKey>(id: NodeId, key: K): NodeProperties[K];
  setProperty<K extends NodePropertyKey>(id: NodeId, key: K, value: NodeProperties[K]): void;

  createGroup(parent: NodeId): NodeId;
  copyControl(source: NodeId, target: NodeId): NodeId;
  deleteNode(id: NodeId): void;

  findScreen(name: string): NodeId | undefined;
  loadScreen(backingPath: string): NodeId;
  unloadScreen(screen: NodeId): void;

  getUpdateSuppression(): UpdateSuppression;
  setUpdateSuppression(state: UpdateSuppression): void;

  /** Sends a named message to the behavior attached to the target. */
  dispatch(target: NodeId, message: string): void;
}

export const topLeftOf = (rect: Rect): { x: number; y: number } => ({ x: rect.left, y: rect.top });

export const centerOf = (rect: Rect): { x: number; y: number } => ({
  x: Math.round(rect.left + rect.width / 2),
  y: Math.round(rect.top + rect.height / 2)
});

export const translateRect = (rect: Rect, dx: number, dy: number): Rect => ({
  left: rect.left + dx,
  top: rect.top + dy,
  width: rect.width,
  height: rect.height
});
