/**
 * @module functional/maybe
 *
 * Optional values without null checks. A `Maybe<T>` is either `Just(value)`
 * or `Nothing`; absence is always a value, never an exception.
 */

export interface JustValue<T> {
  readonly kind: 'just';
  readonly value: T;
}

export interface NothingValue {
  readonly kind: 'nothing';
}

export type Maybe<T> = JustValue<T> | NothingValue;

export const Nothing: NothingValue = Object.freeze({ kind: 'nothing' });

export function Just<T>(value: T): Maybe<T> {
  return { kind: 'just', value };
}

export function isJust<T>(maybe: Maybe<T>): maybe is JustValue<T> {
  return maybe.kind === 'just';
}

export function isNothing<T>(maybe: Maybe<T>): maybe is NothingValue {
  return maybe.kind === 'nothing';
}

/**
 * Lift a nullable value. `null` and `undefined` become `Nothing`.
 */
export function fromNullable<T>(value: T | null | undefined): Maybe<T> {
  return value === null || value === undefined ? Nothing : Just(value);
}

/**
 * Monadic bind. `f` is never called on `Nothing`.
 */
export function bind<T, U>(f: (value: T) => Maybe<U>, maybe: Maybe<T>): Maybe<U> {
  return isJust(maybe) ? f(maybe.value) : Nothing;
}

export function map<T, U>(f: (value: T) => U, maybe: Maybe<T>): Maybe<U> {
  return isJust(maybe) ? Just(f(maybe.value)) : Nothing;
}

/**
 * Unwrap a `Maybe`, substituting `fallback` for `Nothing`.
 */
export function fromMaybe<T>(fallback: T, maybe: Maybe<T>): T {
  return isJust(maybe) ? maybe.value : fallback;
}
