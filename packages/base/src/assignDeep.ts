import { isPlainObject } from './util.js';

const assignDeepImpl = (target: object, source: object): object => {
  for (const [key, value] of Object.entries(source)) {
    if (value === void 0) continue;

    const current: unknown = Reflect.get(target, key);

    if (!isPlainObject(value)) {
      Reflect.set(target, key, value);
    } else if (isPlainObject(current)) {
      assignDeepImpl(current, value);
    } else {
      // copy, so later merges never write through to a source
      Reflect.set(target, key, assignDeepImpl({}, value));
    }
  }

  return target;
};

/**
 * Recursively merge the plain objects of each source in to the target, from
 * left to right. Undefined values in a source are skipped.
 */
export const assignDeep = <T extends object>(target: T, ...sources: (object | undefined)[]): T => {
  for (const object of sources) {
    if (object !== void 0) assignDeepImpl(target, object);
  }

  return target;
};
