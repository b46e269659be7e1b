expect.extend({
  toBeInRange(received: number, min: number, max: number) {
    const pass = received >= min && received <= max;

    return {
      pass,
      message: () =>
        `expected ${received} ${pass ? 'not ' : ''}to be in the range [${min}, ${max}]`,
    };
  },
});

export {};
