/**
 * Branded / Opaque type utility.
 * Prevents accidental interchange of structurally identical primitives.
 *
 * @example
 * type UserId = Brand<string, "UserId">;
 * const id: UserId = brand<string, "UserId">("abc");
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type UserId = Brand<string, "UserId">;
export type Timestamp = Brand<number, "Timestamp">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;

export const userId = (value: string): UserId => brand<string, "UserId">(value);
export const timestamp = (value: number = Date.now()): Timestamp =>
  brand<number, "Timestamp">(value);
