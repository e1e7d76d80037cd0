/**
 * Marker for "no value provided", distinct from `null`.
 * Fields holding EMPTY are skipped on serialization and left untouched on update.
 */
export const EMPTY: unique symbol = Symbol("tessera.empty");

export type Empty = typeof EMPTY;

export function isEmpty(value: unknown): value is Empty {
  return value === EMPTY;
}
