/**
 * Runtime helpers referenced by derived modules
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Runtime shape of a custom type value: the constructor name and its
 * arguments in declaration order
 */
export type Variant = {
  tag: string;
  args: unknown[];
};

export type Cases<T extends Variant, R> = Record<string, ((value: T) => R) | undefined>;

/**
 * Dispatch on `value.tag`. A `_` handler catches every tag without its own.
 */
export function match<T extends Variant, R>(value: T, cases: Cases<T, R>): R {
  const handler = cases[value.tag] ?? cases._;
  if (handler === undefined) {
    throw new Error(`No case for constructor "${value.tag}"`);
  }
  return handler(value);
}

export const Tuple = {
  pair<A, B>(first: A, second: B): [A, B] {
    return [first, second];
  },
  triple<A, B, C>(first: A, second: B, third: C): [A, B, C] {
    return [first, second, third];
  },
};

export const Collections = {
  setOf<T>(values: T[]): Set<T> {
    return new Set(values);
  },
  mapOf<K, V>(entries: [K, V][]): Map<K, V> {
    return new Map(entries);
  },
};

type Encoder<T> = (value: T) => JsonValue;

export const Json = {
  optional<T>(encode: Encoder<T>): Encoder<T | undefined> {
    return (value) => (value === undefined ? null : encode(value));
  },
  set<T>(encode: Encoder<T>): Encoder<Set<T>> {
    return (value) => Array.from(value, encode);
  },
  /** Maps encode as an array of `[key, value]` pairs */
  dict<K, V>(encodeKey: Encoder<K>, encodeValue: Encoder<V>): Encoder<Map<K, V>> {
    return (value) => Array.from(value, ([key, entry]) => [encodeKey(key), encodeValue(entry)]);
  },
  result<E, T>(
    encodeError: Encoder<E>,
    encodeValue: Encoder<T>
  ): Encoder<{ ok: true; value: T } | { ok: false; error: E }> {
    return (value): JsonValue =>
      value.ok ? { ok: true, value: encodeValue(value.value) } : { ok: false, error: encodeError(value.error) };
  },
};
