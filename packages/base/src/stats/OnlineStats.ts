export interface SimpleSummary<T> {
  N(): T;

  mean(): T;

  std(ddof?: number): T;

  range(): [T, T];
}

/**
 * Running mean and variance of a stream of values, using Welford's
 * algorithm to avoid the cancellation of a naive sum of squares.
 */
export class Gaussian implements SimpleSummary<number> {
  #min = Infinity;
  #max = -Infinity;
  #n = 0;
  #M1 = 0;
  #M2 = 0;

  N() {
    return this.#n;
  }

  mean() {
    return this.#n === 0 ? NaN : this.#M1;
  }

  std(ddof = 0) {
    return Math.sqrt(this.var(ddof));
  }

  var(ddof = 0) {
    return this.#M2 / (this.#n - ddof);
  }

  range(): [number, number] {
    return [this.#min, this.#max];
  }

  push(x: number) {
    const n = ++this.#n;

    this.#min = Math.min(this.#min, x);
    this.#max = Math.max(this.#max, x);

    const delta = x - this.#M1;
    this.#M1 += delta / n;
    this.#M2 += delta * (x - this.#M1);

    return n;
  }

  static fromValues(sample: Iterable<number>) {
    const os = new Gaussian();
    for (const x of sample) os.push(x);

    return os;
  }
}
