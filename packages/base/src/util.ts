//
// Common types
//

export type RecursivePartial<T> = {
  [P in keyof T]?:
    T[P] extends (infer U)[] ? RecursivePartial<U>[] :
    T[P] extends object ? RecursivePartial<T[P]> :
    T[P];
};

/** Opaque data type for typescript */
export type As<T> = T & { readonly '': unique symbol };

//
// Helpers
//

/** A non-null, non-array object */
export function isObject(item: unknown): item is object {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/** Objects created by a literal or Object.create(null) */
export function isPlainObject(item: unknown): item is object {
  if (!isObject(item)) return false;

  const proto = Object.getPrototypeOf(item);
  return proto === Object.prototype || proto === null;
}

/** Human readable name of the type of the given value, for messages */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isNaN(value)) return 'NaN';
  return typeof value;
}
