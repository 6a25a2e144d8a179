/**
 * Apply and Applicative Typeclasses
 *
 * Apply extends Functor with the ability to apply a function in a context.
 * Applicative extends Apply with the ability to lift a value into a context.
 * Effectful folds (`cataA`, `transverse`) sequence through these.
 *
 * Laws:
 *   - Identity: pure(id).ap(v) === v
 *   - Homomorphism: pure(f).ap(pure(x)) === pure(f(x))
 *   - Interchange: u.ap(pure(y)) === pure(f => f(y)).ap(u)
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Apply
// ============================================================================

/**
 * Apply typeclass - extends Functor with application
 */
export interface Apply<F extends TypeFunction> extends Functor<F> {
  readonly ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>;
}

// ============================================================================
// Applicative
// ============================================================================

/**
 * Applicative typeclass - extends Apply with pure
 */
export interface Applicative<F extends TypeFunction> extends Apply<F> {
  readonly pure: <A>(a: A) => $<F, A>;
}

// ============================================================================
// Derived Operations from Apply
// ============================================================================

/**
 * Apply two functorial values and combine with a function
 */
export function map2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C) => $<F, C> {
  return <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C): $<F, C> =>
    F.ap(
      F.map(fa, (a: A) => (b: B) => f(a, b)),
      fb,
    );
}

/**
 * Sequence an array of effects left to right
 */
export function sequenceArray<F extends TypeFunction>(
  F: Applicative<F>,
): <A>(fas: readonly $<F, A>[]) => $<F, A[]> {
  return <A>(fas: readonly $<F, A>[]): $<F, A[]> =>
    fas.reduce<$<F, A[]>>(
      (acc, fa) => map2(F)(acc, fa, (as: A[], a: A) => [...as, a]),
      F.pure<A[]>([]),
    );
}
