/**
 * @module functional
 *
 * Small combinator runtime: composition, currying and memoization.
 */

export * as Maybe from './maybe.js';
export type { Maybe as MaybeValue } from './maybe.js';

/**
 * Right-to-left composition: `compose(f, g)(x) === f(g(x))`.
 */
export function compose<A, B, C>(f: (b: B) => C, g: (a: A) => B): (a: A) => C {
  return (a: A) => f(g(a));
}

/**
 * Left-to-right composition: `pipe(g, f)(x) === f(g(x))`.
 */
export function pipe<A, B, C>(g: (a: A) => B, f: (b: B) => C): (a: A) => C {
  return compose(f, g);
}

export interface Curried2<A, B, R> {
  (a: A): (b: B) => R;
  (a: A, b: B): R;
}

export interface Curried3<A, B, C, R> {
  (a: A): Curried2<B, C, R>;
  (a: A, b: B): (c: C) => R;
  (a: A, b: B, c: C): R;
}

export function curry2<A, B, R>(fn: (a: A, b: B) => R): Curried2<A, B, R> {
  function curried(a: A): (b: B) => R;
  function curried(a: A, b: B): R;
  function curried(a: A, ...rest: [] | [B]): R | ((b: B) => R) {
    if (rest.length === 1) {
      return fn(a, rest[0]);
    }
    return (b: B) => fn(a, b);
  }
  return curried;
}

export function curry3<A, B, C, R>(fn: (a: A, b: B, c: C) => R): Curried3<A, B, C, R> {
  function curried(a: A): Curried2<B, C, R>;
  function curried(a: A, b: B): (c: C) => R;
  function curried(a: A, b: B, c: C): R;
  function curried(a: A, ...rest: [] | [B] | [B, C]): R | ((c: C) => R) | Curried2<B, C, R> {
    if (rest.length === 2) {
      return fn(a, rest[0], rest[1]);
    }
    if (rest.length === 1) {
      const b = rest[0];
      return (c: C) => fn(a, b, c);
    }
    return curry2((b: B, c: C) => fn(a, b, c));
  }
  return curried;
}

/** Minimal store accepted by {@link memoize}; a `Map` satisfies it. */
export interface MemoCache<K, V> {
  has(key: K): boolean;
  get(key: K): V | undefined;
  set(key: K, value: V): unknown;
}

/**
 * Cache results of a single-argument function, keyed by argument value
 * (primitives) or identity (objects). Entries are never evicted; pass a
 * `cache` to control its lifetime.
 */
export function memoize<A, R>(fn: (arg: A) => R, cache: MemoCache<A, R> = new Map<A, R>()): (arg: A) => R {
  return (arg: A) => {
    if (cache.has(arg)) {
      const cached = cache.get(arg);
      if (cached !== undefined) {
        return cached;
      }
    }
    const result = fn(arg);
    cache.set(arg, result);
    return result;
  };
}
