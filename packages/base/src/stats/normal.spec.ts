import { ppf, zValue } from './normal.js';

describe('ppf', () => {
  test('percentiles', () => {
    expect(ppf(0.5)).toBeCloseTo(0, 8);
    expect(ppf(0.691)).toBeCloseTo(0.4987, 3);
    expect(ppf(0.006)).toBeCloseTo(-2.5121, 3);
    expect(ppf(0.99)).toBeCloseTo(2.326348, 5);
    expect(ppf(0.975)).toBeCloseTo(1.959964, 5);
    expect(ppf(0.025)).toBeCloseTo(-1.959964, 5);
  });

  test('bounds', () => {
    expect(ppf(0)).toEqual(-Infinity);
    expect(ppf(1)).toEqual(Infinity);
    expect(ppf(-0.1)).toBeNaN();
    expect(ppf(1.1)).toBeNaN();
  });

  test('symmetry', () => {
    expect(ppf(0.01)).toBeCloseTo(-ppf(0.99), 8);
    expect(ppf(0.3)).toBeCloseTo(-ppf(0.7), 8);
  });
});

describe('zValue', () => {
  test('two sided critical values', () => {
    expect(zValue(0.9)).toBeCloseTo(1.644854, 5);
    expect(zValue(0.95)).toBeCloseTo(1.959964, 5);
    expect(zValue(0.99)).toBeCloseTo(2.575829, 5);
  });
});
