// testing/fixtures
// Builders for in-memory screen files used across the test suites.

import type { NodeProperties, Rect } from '../host/hostTree';
import { StaticManifest } from '../host/manifest';
import type { ScreenEntry, TemplateEntry } from '../host/manifest';
import { MemoryHost } from '../host/memoryHost';
import type { CardDefinition, NodeDefinition, ScreenDefinition } from '../host/memoryHost';
import { createViewSync } from '../index';
import type { ViewSync } from '../index';
import type { ViewSyncSettingsOverrides } from '../utils/configuration';
import { createBufferChannel } from '../utils/logger';
import type { BufferChannel } from '../utils/logger';

export const rect = (left: number, top: number, width: number, height: number): Rect => ({ left, top, width, height });

export const control = (name: string, at: Rect, properties: NodeProperties = {}): NodeDefinition => ({
  type: 'control',
  rect: at,
  properties: { name, ...properties }
});

export const group = (name: string, at: Rect, children: NodeDefinition[] = [], properties: NodeProperties = {}): NodeDefinition => ({
  type: 'group',
  rect: at,
  properties: { name, ...properties },
  children
});

export const view = (kind: string, name: string, at: Rect, children: NodeDefinition[] = []): NodeDefinition =>
  group(name, at, children, { viewKind: kind });

export const screen = (name: string, card: CardDefinition, backgrounds: NodeDefinition[] = []): ScreenDefinition => ({
  name,
  cards: [card],
  backgrounds
});

export interface Fixture {
  host: MemoryHost;
  sync: ViewSync;
  channel: BufferChannel;
}

export interface FixtureOptions {
  templates: Record<string, CardDefinition>;
  screens?: Record<string, CardDefinition>;
  settings?: ViewSyncSettingsOverrides;
}

export const templatePath = (kind: string): string => `views/${kind}.screen`;
export const screenPath = (name: string): string => `screens/${name}.screen`;

// Every template and screen lives in its own file; the template list screen is declared but never loaded.
export function createFixture(options: FixtureOptions): Fixture {
  const host = new MemoryHost();
  const templates: TemplateEntry[] = [];
  const screens: ScreenEntry[] = [{ key: 'templates', name: 'Templates', backingPath: 'screens/Templates.screen' }];

  for (const [kind, card] of Object.entries(options.templates)) {
    host.writeFile(templatePath(kind), screen(kind, card));
    templates.push({ kind, backingPath: templatePath(kind) });
  }
  for (const [name, card] of Object.entries(options.screens ?? {})) {
    host.writeFile(screenPath(name), screen(name, card));
    screens.push({ key: name.toLowerCase(), name, backingPath: screenPath(name) });
  }

  const channel = createBufferChannel();
  const sync = createViewSync({
    host,
    manifest: new StaticManifest(templates, screens),
    settings: options.settings,
    channel
  });
  return { host, sync, channel };
}

export function requireNode(host: MemoryHost, root: string, name: string): string {
  const id = host.findByName(root, name);
  if (id === undefined) throw new Error(`no node named ${name} under ${root}`);
  return id;
}

export function childNames(host: MemoryHost, id: string): (string | undefined)[] {
  return host.listChildren(id).map(child => host.getProperty(child, 'name'));
}
