function err(msg: string): never {
  throw new Error('[Failed assertion] ' + msg);
}

export function gt(a: number, b: number, msg?: string): void {
  if (!(a > b)) err(msg ?? `Expected ${a} to be > ${b}`);
}

export function gte(a: number, b: number, msg?: string): void {
  if (!(a >= b)) err(msg ?? `Expected ${a} to be >= ${b}`);
}

/** Exclusive range check */
export function inRange(val: number, min: number, max: number, msg?: string): void {
  if (!(val > min && val < max)) err(msg ?? `Expected ${min} < ${val} < ${max}`);
}

