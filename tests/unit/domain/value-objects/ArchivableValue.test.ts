import { describe, expect, it } from 'vitest';

import { classifyValue, normalizeRecord, toJsonValue } from '@/domain/value-objects/ArchivableValue';

class AssetHandle {
  public constructor(private readonly url: string) {}

  public toString(): string {
    return this.url;
  }
}

describe('ArchivableValue', () => {
  it('classifies values into the closed set of kinds', () => {
    expect(classifyValue('text').kind).toBe('primitive');
    expect(classifyValue(42).kind).toBe('primitive');
    expect(classifyValue(null).kind).toBe('primitive');
    expect(classifyValue(new Date('2024-01-01T00:00:00.000Z')).kind).toBe('timestamp');
    expect(classifyValue(new AssetHandle('https://cdn.example.test/a.png')).kind).toBe('opaque');
    expect(classifyValue(10n).kind).toBe('opaque');
    expect(classifyValue(['a']).kind).toBe('collection');
    expect(classifyValue({ a: 1 }).kind).toBe('collection');
    expect(classifyValue(() => 1).kind).toBe('unsupported');
    expect(classifyValue(undefined).kind).toBe('unsupported');
  });

  it('converts each kind with its own rule', () => {
    expect(toJsonValue(new Date('2024-01-01T00:00:00.000Z'))).toBe('2024-01-01T00:00:00.000Z');
    expect(toJsonValue(new AssetHandle('https://cdn.example.test/a.png'))).toBe('https://cdn.example.test/a.png');
    expect(toJsonValue(123456789012345678901n)).toBe('123456789012345678901');
    expect(toJsonValue(Number.NaN)).toBeNull();
    expect(toJsonValue(Symbol('hidden'))).toBeUndefined();
  });

  it('normalizes nested collections and drops values without a JSON form', () => {
    const normalized = normalizeRecord({
      name: 'Guild',
      created: new Date('2022-06-01T08:30:00.000Z'),
      features: ['COMMUNITY', new AssetHandle('x')],
      nested: { when: new Date('2022-06-02T00:00:00.000Z'), skip: undefined },
      callback: () => 'nope',
    });

    expect(normalized).toEqual({
      name: 'Guild',
      created: '2022-06-01T08:30:00.000Z',
      features: ['COMMUNITY', 'x'],
      nested: { when: '2022-06-02T00:00:00.000Z' },
    });
  });

  it('is a no-op on an already normalized record', () => {
    const once = normalizeRecord({
      id: '876543210987654321',
      icon: new AssetHandle('https://cdn.example.test/icon.png'),
      created_at: new Date('2020-02-02T10:00:00.000Z'),
      large: false,
      features: ['NEWS'],
    });

    expect(normalizeRecord(once)).toEqual(once);
  });
});
