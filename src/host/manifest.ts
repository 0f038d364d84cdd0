// host/manifest
// Application manifest contract plus a static and a JSON-file backed implementation.

import * as fs from 'fs';
import * as path from 'path';

export interface TemplateEntry {
  kind: string;
  backingPath: string;
}

export interface ScreenEntry {
  key: string;
  name: string;
  backingPath: string;
}

export interface ManifestService {
  listTemplates(): TemplateEntry[];
  listScreens(): ScreenEntry[];
}

export class StaticManifest implements ManifestService {
  constructor(
    private readonly templates: TemplateEntry[],
    private readonly screens: ScreenEntry[] = []
  ) {}

  listTemplates(): TemplateEntry[] {
    return [...this.templates];
  }

  listScreens(): ScreenEntry[] {
    return [...this.screens];
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isTemplateEntry = (value: unknown): value is TemplateEntry =>
  isRecord(value) && typeof value.kind === 'string' && value.kind.length > 0 && typeof value.backingPath === 'string';

const isScreenEntry = (value: unknown): value is ScreenEntry =>
  isRecord(value) && typeof value.key === 'string' && typeof value.name === 'string' && typeof value.backingPath === 'string';

export function parseManifest(raw: unknown, source = 'manifest'): StaticManifest {
  if (!isRecord(raw)) {
    throw new Error(`${source}: expected an object with "templates" and "screens"`);
  }
  const templates = raw.templates ?? [];
  const screens = raw.screens ?? [];
  if (!Array.isArray(templates) || !Array.isArray(screens)) {
    throw new Error(`${source}: "templates" and "screens" must be arrays`);
  }
  const badTemplate = templates.findIndex(t => !isTemplateEntry(t));
  if (badTemplate !== -1) {
    throw new Error(`${source}: templates[${badTemplate}] needs a non-empty "kind" and a "backingPath"`);
  }
  const badScreen = screens.findIndex(s => !isScreenEntry(s));
  if (badScreen !== -1) {
    throw new Error(`${source}: screens[${badScreen}] needs "key", "name" and "backingPath"`);
  }
  return new StaticManifest(templates.filter(isTemplateEntry), screens.filter(isScreenEntry));
}

// Relative backing paths are resolved against the manifest's own folder.
export function loadManifestFile(manifestPath: string): StaticManifest {
  const text = fs.readFileSync(manifestPath, 'utf8');
  const manifest = parseManifest(JSON.parse(text), path.basename(manifestPath));
  const baseDir = path.dirname(manifestPath);
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.join(baseDir, p));
  return new StaticManifest(
    manifest.listTemplates().map(t => ({ ...t, backingPath: resolve(t.backingPath) })),
    manifest.listScreens().map(s => ({ ...s, backingPath: resolve(s.backingPath) }))
  );
}
