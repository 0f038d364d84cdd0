// diffNavigationTypes
// Defines shared types for sync preview hunks and navigation entries.

export interface LineRange {
  start: number;
  end: number;
}

export interface DiffNavigationEntry {
  originalRange: LineRange;
  modifiedRange: LineRange;
  preferredSide: 'original' | 'modified';
  previewLines: string[];
}

export interface SyncPreview {
  kind: string;
  instance: string;
  current: string[];
  planned: string[];
  entries: DiffNavigationEntry[];
  changed: boolean;
}
