// utils/configuration
// Settings for the sync engine: defaults merged with caller-supplied overrides.

export interface LifecycleMessages {
  instantiated: string;
  resize: string;
}

export interface ViewSyncSettings {
  // Manifest screen key that names the template list; those screens are never scanned as app screens.
  templateListKey: string;
  defaultInstanceSize: number;
  instantiateNestedViews: boolean;
  lifecycleMessages: LifecycleMessages;
}

export type ViewSyncSettingsOverrides = Partial<Omit<ViewSyncSettings, 'lifecycleMessages'>> & {
  lifecycleMessages?: Partial<LifecycleMessages>;
};

export interface ViewSyncConfiguration {
  readonly settings: Readonly<ViewSyncSettings>;
  get<K extends keyof ViewSyncSettings>(key: K): ViewSyncSettings[K];
}

export const DEFAULT_SETTINGS: Readonly<ViewSyncSettings> = Object.freeze({
  templateListKey: 'templates',
  defaultInstanceSize: 300,
  instantiateNestedViews: true,
  lifecycleMessages: Object.freeze({ instantiated: 'viewInstantiated', resize: 'viewResized' })
});

export function getConfiguration(overrides: ViewSyncSettingsOverrides = {}): ViewSyncConfiguration {
  const settings: ViewSyncSettings = {
    templateListKey: overrides.templateListKey ?? DEFAULT_SETTINGS.templateListKey,
    defaultInstanceSize: overrides.defaultInstanceSize ?? DEFAULT_SETTINGS.defaultInstanceSize,
    instantiateNestedViews: overrides.instantiateNestedViews ?? DEFAULT_SETTINGS.instantiateNestedViews,
    lifecycleMessages: { ...DEFAULT_SETTINGS.lifecycleMessages, ...overrides.lifecycleMessages }
  };
  if (!Number.isFinite(settings.defaultInstanceSize) || settings.defaultInstanceSize <= 0) {
    throw new RangeError(`defaultInstanceSize must be a positive number, got ${settings.defaultInstanceSize}`);
  }
  return {
    settings,
    get: <K extends keyof ViewSyncSettings>(key: K): ViewSyncSettings[K] => settings[key]
  };
}
