/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over. Every pattern
 * representation handed to a recursion scheme must be a Functor: mapping
 * rewrites the values at recursive positions and nothing else.
 *
 * Instances must satisfy the following laws:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * A map that changes the shape (drops a position, switches the variant)
 * breaks every scheme built on top of it without any runtime signal.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

/**
 * Functor typeclass interface.
 */
export interface Functor<F extends TypeFunction> {
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace all A values with a constant B value
 */
export function as<F extends TypeFunction>(F: Functor<F>): <A, B>(fa: $<F, A>, b: B) => $<F, B> {
  return (fa, b) => F.map(fa, () => b);
}

/**
 * Tuple the value with a constant on the left
 */
export function tupleLeft<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(fa: $<F, A>, b: B) => $<F, readonly [B, A]> {
  return (fa, b) => F.map(fa, (a) => [b, a] as const);
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return (f) => (fa) => F.map(fa, f);
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Functor instance from a map function
 */
export function makeFunctor<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
): Functor<F> {
  return { map };
}

// ============================================================================
// Compose Functors
// ============================================================================

/**
 * Type-level function for the composition `F<G<A>>`.
 */
export interface ComposeF<F extends TypeFunction, G extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: $<F, $<G, this["__kind__"]>>;
}

/**
 * Compose two functors
 */
export function composeFunctor<F extends TypeFunction, G extends TypeFunction>(
  F: Functor<F>,
  G: Functor<G>,
): Functor<ComposeF<F, G>> {
  return {
    map: (fga, f) => F.map(fga, (ga) => G.map(ga, f)),
  };
}
