import { describe, it, expect } from 'vitest';
import { PmsRegistry, registryKeyFor } from '@/integrations/registry';
import { fakeAdapter } from '../../helpers/fake-adapter';

describe('registryKeyFor', () => {
  it('prefixes the capitalized vendor name', () => {
    expect(registryKeyFor('mews')).toBe('PMS_Mews');
    expect(registryKeyFor('MEWS')).toBe('PMS_Mews');
    expect(registryKeyFor('cloudBeds')).toBe('PMS_Cloudbeds');
  });
});

describe('PmsRegistry', () => {
  it('resolves a registered adapter regardless of name casing', () => {
    const mews = fakeAdapter('Mews');
    const registry = new PmsRegistry().register(mews);

    expect(registry.resolve('mews')).toBe(mews);
    expect(registry.resolve('Mews')).toBe(mews);
    expect(registry.resolve('MEWS')).toBe(mews);
  });

  it('returns null for vendors without an adapter', () => {
    const registry = new PmsRegistry().register(fakeAdapter('Mews'));

    expect(registry.resolve('opera')).toBeNull();
    expect(registry.resolve('')).toBeNull();
  });

  it('lists adapters in registration order', () => {
    const mews = fakeAdapter('Mews');
    const cloudbeds = fakeAdapter('Cloudbeds');
    const registry = new PmsRegistry().register(mews).register(cloudbeds);

    expect(registry.list()).toEqual([mews, cloudbeds]);
  });

  it('refuses to register the same vendor twice', () => {
    const registry = new PmsRegistry().register(fakeAdapter('Mews'));

    expect(() => registry.register(fakeAdapter('Mews'))).toThrow(
      'PMS adapter already registered: PMS_Mews',
    );
  });
});
