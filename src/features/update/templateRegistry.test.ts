import { describe, expect, it } from 'vitest';
import { StaticManifest } from '../../host/manifest';
import { TemplateRegistry } from './templateRegistry';

const registry = new TemplateRegistry(
  new StaticManifest(
    [
      { kind: 'Header', backingPath: 'views/Header.screen' },
      { kind: 'Footer', backingPath: 'views/Footer.screen' }
    ],
    [
      { key: 'templates', name: 'Templates', backingPath: 'screens/Templates.screen' },
      { key: 'home', name: 'Home', backingPath: 'screens/Home.screen' },
      { key: 'header', name: 'Header', backingPath: 'views/Header.screen' }
    ]
  )
);

describe('TemplateRegistry', () => {
  it('resolves declared kinds only', () => {
    expect(registry.resolves('Header')).toBe(true);
    expect(registry.resolves('header')).toBe(false);
    expect(registry.resolves('')).toBe(false);
    expect(registry.lookup('Footer')).toEqual({ kind: 'Footer', backingPath: 'views/Footer.screen' });
  });

  it('lists templates in manifest order', () => {
    expect(registry.list().map(t => t.kind)).toEqual(['Header', 'Footer']);
  });

  it('leaves the template list and the templates themselves out of the app screens', () => {
    expect(registry.listAppScreens('templates').map(s => s.name)).toEqual(['Home']);
  });
});
