/** Turns a cached JSON value back into a typed one; throws when the shape is wrong. */
export type CacheParser<T> = (value: unknown) => T;

export type CacheSetOptions = {
  ttlSeconds: number;
  serialize?: (value: unknown) => string;
};
