// diff/syncPreview
// Describes instance content as lines and diffs the current content against what a sync would produce.

import { structuredPatch } from 'diff';
import { COSMETIC_PROPERTIES } from '../../host/hostTree';
import type { HostTree, NodeId, Rect } from '../../host/hostTree';
import { TemplateNotFoundError, guardHost } from '../../utils/errors';
import { classifyNode } from '../../utils/templateDetection';
import { planInstanceContent, templateCardOf } from '../update/contentPlan';
import type { SyncDeps } from '../update/syncEngine';
import type { DiffNavigationEntry, SyncPreview } from './diffNavigationTypes';

const INDENT = '  ';

const formatRect = (rect: Rect): string => `${rect.left},${rect.top},${rect.width},${rect.height}`;

function propertyLines(host: HostTree, id: NodeId): string[] {
  const lines = [`behavior: ${host.getProperty(id, 'behavior') || '(none)'}`];
  for (const key of COSMETIC_PROPERTIES) {
    const value = host.getProperty(id, key);
    if (value !== undefined) lines.push(`${key}: ${value}`);
  }
  return lines;
}

function formatControl(host: HostTree, id: NodeId, rect: Rect): string {
  let line = `control "${host.getProperty(id, 'name') ?? ''}" ${formatRect(rect)}`;
  const behavior = host.getProperty(id, 'behavior');
  if (behavior) line += ` behavior=${behavior}`;
  for (const key of COSMETIC_PROPERTIES) {
    const value = host.getProperty(id, key);
    if (value !== undefined) line += ` ${key}=${value}`;
  }
  return line;
}

const formatView = (kind: string, name: string | undefined, rect: Rect): string =>
  `view ${kind} "${name ?? ''}" ${formatRect(rect)}`;

function describeChildren(host: HostTree, id: NodeId, depth: number, lines: string[]): void {
  const indent = INDENT.repeat(depth);
  for (const child of host.listChildren(id)) {
    const node = classifyNode(host, child);
    const rect = host.getRect(child);
    if (node.type === 'control') {
      lines.push(indent + formatControl(host, child, rect));
    } else if (node.type === 'instance') {
      lines.push(indent + formatView(node.kind, host.getProperty(child, 'name'), rect));
      for (const line of propertyLines(host, child)) lines.push(indent + INDENT + line);
      describeChildren(host, child, depth + 1, lines);
    } else {
      lines.push(`${indent}group "${host.getProperty(child, 'name') ?? ''}" ${formatRect(rect)}`);
      describeChildren(host, child, depth + 1, lines);
    }
  }
}

export function describeInstanceContent(host: HostTree, instance: NodeId): string[] {
  const lines = propertyLines(host, instance);
  describeChildren(host, instance, 0, lines);
  return lines;
}

function describePlannedContent(kind: string, rect: Rect, deps: SyncDeps, stack: readonly string[], depth: number): string[] {
  const { host, memory, configuration } = deps;
  const indent = INDENT.repeat(depth);
  return memory.withTemplate(kind, templateScreen => {
    const card = templateCardOf(host, templateScreen);
    if (card === undefined) return [`${indent}behavior: (none)`];
    const plan = planInstanceContent(host, card, rect, { includeNested: configuration.get('instantiateNestedViews') });
    const lines = [`${indent}behavior: ${plan.behavior ?? '(none)'}`];
    for (const key of COSMETIC_PROPERTIES) {
      const value = plan.cosmetics[key];
      if (value !== undefined) lines.push(`${indent}${key}: ${value}`);
    }
    const nextStack = [...stack, kind];
    for (const item of plan.items) {
      if (item.type === 'copy') {
        lines.push(indent + formatControl(host, item.source, item.rect));
        continue;
      }
      lines.push(indent + formatView(item.kind, item.name, item.rect));
      if (nextStack.includes(item.kind) || !deps.registry.resolves(item.kind)) {
        // Mirrors the empty shell the sync leaves for a self-embedding or unregistered view.
        lines.push(`${indent}${INDENT}behavior: (none)`);
      } else {
        lines.push(...describePlannedContent(item.kind, item.rect, deps, nextStack, depth + 1));
      }
    }
    return lines;
  });
}

export function buildNavigationEntries(current: string[], planned: string[]): DiffNavigationEntry[] {
  const patch = structuredPatch('current', 'planned', `${current.join('\n')}\n`, `${planned.join('\n')}\n`, '', '');
  const entries: DiffNavigationEntry[] = [];
  for (const hunk of patch.hunks) {
    const oldStart = Math.max(0, hunk.oldStart - 1);
    const newStart = Math.max(0, hunk.newStart - 1);
    const preferredSide: 'original' | 'modified' = hunk.newLines === 0 && hunk.oldLines > 0 ? 'original' : 'modified';
    entries.push({
      originalRange: { start: oldStart, end: oldStart + Math.max(hunk.oldLines, 1) - 1 },
      modifiedRange: { start: newStart, end: newStart + Math.max(hunk.newLines, 1) - 1 },
      preferredSide,
      previewLines: hunk.lines.filter(line => line.startsWith('+') || line.startsWith('-'))
    });
  }
  return entries;
}

/**
 * Computes what `syncInstance` would change on `instance` without mutating it.
 */
export function previewSync(kind: string, instance: NodeId, deps: SyncDeps): SyncPreview {
  if (!deps.registry.resolves(kind)) throw new TemplateNotFoundError(kind);
  const rect = guardHost('getRect', instance, () => deps.host.getRect(instance));
  const current = describeInstanceContent(deps.host, instance);
  const planned = describePlannedContent(kind, rect, deps, [], 0);
  const entries = buildNavigationEntries(current, planned);
  return { kind, instance, current, planned, entries, changed: entries.length > 0 };
}
