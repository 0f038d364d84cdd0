// features/update/templateRegistry
// Read-only lookup of declared templates, backed by the application manifest.

import type { ManifestService, ScreenEntry, TemplateEntry } from '../../host/manifest';

export class TemplateRegistry {
  constructor(private readonly manifest: ManifestService) {}

  resolves(kind: string): boolean {
    return this.lookup(kind) !== undefined;
  }

  lookup(kind: string): TemplateEntry | undefined {
    if (!kind) return undefined;
    return this.manifest.listTemplates().find(t => t.kind === kind);
  }

  list(): TemplateEntry[] {
    return this.manifest.listTemplates();
  }

  // Application screens that are neither the template list itself nor a template.
  listAppScreens(templateListKey: string): ScreenEntry[] {
    const kinds = new Set(this.list().map(t => t.kind));
    return this.manifest.listScreens().filter(s => s.key !== templateListKey && !kinds.has(s.name));
  }
}
