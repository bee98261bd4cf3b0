/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it went through a parser at a boundary
 * (session ids, config values). Brands are erased at runtime.
 *
 * NOTE: a string-keyed marker is used instead of a `unique symbol` so that
 * zod schemas transforming into branded types can be exported (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
