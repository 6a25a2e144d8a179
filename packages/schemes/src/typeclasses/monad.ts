/**
 * FlatMap and Monad Typeclasses
 *
 * FlatMap adds flatMap (bind) to Apply - sequencing dependent computations.
 * Monad combines FlatMap with Applicative. Generalized unfolds thread a
 * monad through every step of the coalgebra.
 *
 * Laws:
 *   - Left identity: pure(a).flatMap(f) === f(a)
 *   - Right identity: m.flatMap(pure) === m
 *   - Associativity: m.flatMap(f).flatMap(g) === m.flatMap(a => f(a).flatMap(g))
 */

import type { Applicative, Apply } from "./applicative.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// FlatMap
// ============================================================================

/**
 * FlatMap typeclass - adds flatMap to Apply
 */
export interface FlatMap<F extends TypeFunction> extends Apply<F> {
  readonly flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>;
}

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass - combines FlatMap with Applicative
 */
export interface Monad<F extends TypeFunction> extends FlatMap<F>, Applicative<F> {}

// ============================================================================
// Derived Operations from FlatMap
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(F: FlatMap<F>): <A>(ffa: $<F, $<F, A>>) => $<F, A> {
  return <A>(ffa: $<F, $<F, A>>): $<F, A> => F.flatMap(ffa, (fa: $<F, A>) => fa);
}

/**
 * Kleisli composition (>=>) - compose two monadic functions
 */
export function andThen<F extends TypeFunction>(
  F: FlatMap<F>,
): <A, B, C>(f: (a: A) => $<F, B>, g: (b: B) => $<F, C>) => (a: A) => $<F, C> {
  return (f, g) => (a) => F.flatMap(f(a), g);
}

// ============================================================================
// Instance Creator
// ============================================================================

/**
 * Create a Monad instance from map, flatMap and pure
 */
export function makeMonad<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Monad<F> {
  return {
    map,
    flatMap,
    pure,
    ap: (fab, fa) => flatMap(fab, (f) => map(fa, f)),
  };
}
