import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { describeInstanceContent } from '../diff/syncPreview';
import { childNames, control, createFixture, group, rect, requireNode, screenPath, view } from '../../testing/fixtures';
import type { Fixture } from '../../testing/fixtures';
import type { CardDefinition } from '../../host/memoryHost';

const FOO: CardDefinition = {
  properties: { behavior: 'fooBehavior', backgroundColor: '#ffffff' },
  children: [
    control('label', rect(10, 20, 100, 30), { textSize: 12 }),
    control('button', rect(10, 60, 80, 24), { behavior: 'fooButton' })
  ]
};

const BAR: CardDefinition = {
  children: [
    control('title', rect(0, 0, 50, 10)),
    view('Foo', 'innerFoo', rect(5, 5, 200, 100), [control('stale', rect(5, 5, 10, 10))])
  ]
};

const MAIN: CardDefinition = {
  children: [
    view('Foo', 'fooA', rect(100, 100, 300, 300), [control('old', rect(100, 100, 10, 10))]),
    view('Bar', 'barA', rect(0, 400, 300, 300))
  ]
};

function openMain(fixture: Fixture): string {
  return fixture.host.loadScreen(screenPath('Main'));
}

describe('syncInstance', () => {
  let fixture: Fixture;
  let main: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    fixture = createFixture({ templates: { Foo: FOO, Bar: BAR }, screens: { Main: MAIN } });
    main = openMain(fixture);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('replaces the instance content with the template controls, offset to the instance', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    expect(sync.syncInstance('Foo', fooA)).toEqual({ status: 'updated', instance: fooA });
    expect(childNames(host, fooA)).toEqual(['label', 'button']);
    expect(host.getRect(requireNode(host, fooA, 'label'))).toEqual(rect(110, 120, 100, 30));
    expect(host.getRect(requireNode(host, fooA, 'button'))).toEqual(rect(110, 160, 80, 24));
    expect(host.getProperty(requireNode(host, fooA, 'label'), 'textSize')).toBe(12);
  });

  it('copies behavior and cosmetics from the template card and keeps geometry and tag', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');
    host.setProperty(fooA, 'textFont', 'Mono');

    sync.syncInstance('Foo', fooA);

    expect(host.getProperty(fooA, 'behavior')).toBe('fooBehavior');
    expect(host.getProperty(fooA, 'backgroundColor')).toBe('#ffffff');
    expect(host.getProperty(fooA, 'textFont')).toBeUndefined();
    expect(host.getProperty(fooA, 'viewKind')).toBe('Foo');
    expect(host.getProperty(fooA, 'name')).toBe('fooA');
    expect(host.getProperty(fooA, 'clipsToRect')).toBe(true);
    expect(host.getProperty(fooA, 'selectGroupedControls')).toBe(false);
    expect(host.getRect(fooA)).toEqual(rect(100, 100, 300, 300));
  });

  it('dispatches the lifecycle messages to the instance after populating it', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    sync.syncInstance('Foo', fooA);

    expect(host.dispatched.filter(m => m.target === fooA).map(m => m.message)).toEqual(['viewInstantiated', 'viewResized']);
  });

  it('is idempotent', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    sync.syncInstance('Foo', fooA);
    const first = describeInstanceContent(host, fooA);
    sync.syncInstance('Foo', fooA);

    expect(describeInstanceContent(host, fooA)).toEqual(first);
    expect(host.listChildren(fooA)).toHaveLength(2);
  });

  it('logs the change and the process completion', () => {
    const { host, sync, channel } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    sync.syncInstance('Foo', fooA);

    expect(channel.lines).toContain(`[VIEW-SYNC] Foo -> ${fooA}: removed 1, added 2`);
    expect(channel.lines).toContain('[view-template-sync] Process completed (syncInstance:Foo) with error code -> 0');
  });

  it('unloads a template it loaded and leaves a resident one loaded', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    sync.syncInstance('Foo', fooA);
    expect(host.findScreen('Foo')).toBeUndefined();

    const resident = host.loadScreen('views/Foo.screen');
    sync.syncInstance('Foo', fooA);
    expect(host.findScreen('Foo')).toBe(resident);
  });

  it('fails with TemplateNotFound for an unknown kind and leaves the instance alone', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');

    const result = sync.syncInstance('Missing', fooA);

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('TemplateNotFound');
      expect(result.error.message).toBe('No template registered for kind "Missing"');
    }
    expect(childNames(host, fooA)).toEqual(['old']);
  });

  it('refuses a target that is not a group', () => {
    const { host, sync } = fixture;
    const old = requireNode(host, main, 'old');

    const result = sync.syncInstance('Foo', old);

    expect(result.status).toBe('error');
    if (result.status === 'error') expect(result.error.code).toBe('HostMutationFailure');
  });

  it('reports a host failure mid-populate and restores update suppression', () => {
    const { host, sync } = fixture;
    const fooA = requireNode(host, main, 'fooA');
    vi.spyOn(host, 'copyControl').mockImplementation(() => {
      throw new Error('disk full');
    });

    const result = sync.syncInstance('Foo', fooA);

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error.code).toBe('HostMutationFailure');
      expect(result.error.message).toMatch(/^copyControl \(.+\) failed: disk full$/);
    }
    expect(host.getUpdateSuppression()).toEqual({ redraw: false, messages: false });
    expect(host.findScreen('Foo')).toBeUndefined();
  });

  it('instantiates nested views from the template recursively', () => {
    const { host, sync } = fixture;
    const barA = requireNode(host, main, 'barA');

    sync.syncInstance('Bar', barA);

    expect(childNames(host, barA)).toEqual(['title', 'innerFoo']);
    const innerFoo = requireNode(host, barA, 'innerFoo');
    expect(host.getProperty(innerFoo, 'viewKind')).toBe('Foo');
    expect(host.getRect(innerFoo)).toEqual(rect(5, 405, 200, 100));
    expect(childNames(host, innerFoo)).toEqual(['label', 'button']);
    expect(host.getRect(requireNode(host, innerFoo, 'label'))).toEqual(rect(15, 425, 100, 30));
  });

  it('skips nested views when nested instantiation is off', () => {
    const off = createFixture({
      templates: { Foo: FOO, Bar: BAR },
      screens: { Main: MAIN },
      settings: { instantiateNestedViews: false }
    });
    const offMain = openMain(off);
    const barA = requireNode(off.host, offMain, 'barA');

    off.sync.syncInstance('Bar', barA);

    expect(childNames(off.host, barA)).toEqual(['title']);
  });
});

describe('syncInstance template shapes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the sole plain group on a bare card as the content root', () => {
    const { host, sync } = createFixture({
      templates: {
        Wrapped: { children: [group('frame', rect(50, 50, 200, 100), [control('a', rect(60, 70, 10, 10))])] }
      },
      screens: { Main: { children: [view('Wrapped', 'w', rect(0, 0, 200, 100))] } }
    });
    const main = host.loadScreen(screenPath('Main'));
    const w = requireNode(host, main, 'w');

    sync.syncInstance('Wrapped', w);

    expect(childNames(host, w)).toEqual(['a']);
    expect(host.getRect(requireNode(host, w, 'a'))).toEqual(rect(10, 20, 10, 10));
  });

  it('leaves a self-embedded view as an empty tagged shell', () => {
    const { host, sync, channel } = createFixture({
      templates: {
        Tree: { children: [control('leaf', rect(0, 0, 10, 10)), view('Tree', 'subtree', rect(20, 20, 50, 50))] }
      },
      screens: { Main: { children: [view('Tree', 'root', rect(0, 0, 100, 100))] } }
    });
    const main = host.loadScreen(screenPath('Main'));
    const root = requireNode(host, main, 'root');

    expect(sync.syncInstance('Tree', root).status).toBe('updated');

    expect(childNames(host, root)).toEqual(['leaf', 'subtree']);
    const subtree = requireNode(host, root, 'subtree');
    expect(host.getProperty(subtree, 'viewKind')).toBe('Tree');
    expect(host.listChildren(subtree)).toEqual([]);
    expect(channel.lines).toContain('[VIEW-SYNC] Nested Tree inside Tree would recurse into itself; left empty');
  });

  it('leaves a nested view of an unregistered kind as an empty tagged shell', () => {
    const { host, sync, channel } = createFixture({
      templates: {
        Holder: {
          children: [control('label', rect(0, 0, 10, 10)), view('Gone', 'gone', rect(10, 10, 20, 20)), control('after', rect(40, 0, 10, 10))]
        }
      },
      screens: { Main: { children: [view('Holder', 'h', rect(0, 0, 100, 100))] } }
    });
    const main = host.loadScreen(screenPath('Main'));
    const h = requireNode(host, main, 'h');

    expect(sync.syncInstance('Holder', h).status).toBe('updated');

    expect(childNames(host, h)).toEqual(['label', 'gone', 'after']);
    const gone = requireNode(host, h, 'gone');
    expect(host.getProperty(gone, 'viewKind')).toBe('Gone');
    expect(host.listChildren(gone)).toEqual([]);
    expect(channel.lines).toContain('[VIEW-SYNC] Nested Gone inside Holder has no template; left empty');
  });
});

describe('clearInstance', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('removes every child and returns how many there were', () => {
    const { host, sync } = createFixture({ templates: { Foo: FOO }, screens: { Main: MAIN } });
    const main = host.loadScreen(screenPath('Main'));
    const fooA = requireNode(host, main, 'fooA');

    expect(sync.clearInstance(fooA)).toBe(1);
    expect(host.listChildren(fooA)).toEqual([]);
    expect(host.getProperty(fooA, 'viewKind')).toBe('Foo');
    expect(sync.clearInstance(fooA)).toBe(0);
  });
});
