import { assignDeep } from './assignDeep.js';

describe('assignDeep', () => {
  test('merges nested objects', () => {
    const target = { a: 1, b: { c: 2, d: 3 } };
    const result = assignDeep(target, { b: { d: 4 } }, { e: 5 });

    expect(result).toBe(target);
    expect(result).toEqual({ a: 1, b: { c: 2, d: 4 }, e: 5 });
  });

  test('skips undefined values', () => {
    const result = assignDeep({ a: 1, b: { c: 2 } }, { a: undefined, b: { c: undefined } });
    expect(result).toEqual({ a: 1, b: { c: 2 } });
  });

  test('replaces arrays rather than merging them', () => {
    const result = assignDeep({ a: [1, 2, 3] }, { a: [4] });
    expect(result).toEqual({ a: [4] });
  });

  test('never writes through to a source', () => {
    const defaults = { nested: { x: 1 } };
    const merged = assignDeep({}, defaults, { nested: { x: 2 } });

    expect(merged).toEqual({ nested: { x: 2 } });
    expect(defaults).toEqual({ nested: { x: 1 } });
  });
});
