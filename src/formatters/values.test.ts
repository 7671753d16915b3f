import { describe, it, expect, beforeAll } from 'vitest';
import { getAttribute, displayValue, normalizeObject } from './values.js';

describe('getAttribute', () => {
  it('reads own attributes', () => {
    expect(getAttribute({ name: 'a' }, 'name')).toBe('a');
  });

  it('reads missing and inherited attributes as undefined', () => {
    expect(getAttribute({ name: 'a' }, 'status')).toBeUndefined();
    expect(getAttribute({ name: 'a' }, 'constructor')).toBeUndefined();
  });
});

describe('displayValue', () => {
  it('converts scalars', () => {
    expect(displayValue('up')).toBe('up');
    expect(displayValue(42)).toBe('42');
    expect(displayValue(false)).toBe('false');
  });

  it('shows absent values as empty text', () => {
    expect(displayValue(undefined)).toBe('');
    expect(displayValue(null)).toBe('');
  });

  it('encodes structured values as JSON', () => {
    expect(displayValue({ a: 1 })).toBe('{"a":1}');
    expect(displayValue(['x', 'y'])).toBe('["x","y"]');
  });

  it('shows dates in ISO form', () => {
    expect(displayValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z');
  });
});

describe('normalizeObject', () => {
  beforeAll(() => {
    process.env.TZ = 'UTC';
  });

  it('localizes listed fields on a copy', () => {
    const obj = { name: 'a', created_at: '2024-03-01T10:20:30Z', other: '2024-03-01T10:20:30Z' };
    const normalized = normalizeObject(obj, ['name', 'created_at']);

    expect(normalized).toEqual({
      name: 'a',
      created_at: '2024-03-01T10:20:30+00:00',
      other: '2024-03-01T10:20:30Z',
    });
    expect(obj.created_at).toBe('2024-03-01T10:20:30Z');
  });

  it('does not add missing fields', () => {
    expect(normalizeObject({ name: 'a' }, ['status'])).toEqual({ name: 'a' });
  });
});
