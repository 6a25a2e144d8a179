/**
 * Comonad Typeclass
 *
 * The dual of Monad: a context you can always read a value out of
 * (`extract`) and that can be re-focused on every sub-context
 * (`duplicate`). Generalized folds thread a comonad through every layer so
 * the algebra can see more than the immediate child result.
 *
 * Laws:
 *   - Left identity: extract(duplicate(wa)) === wa
 *   - Right identity: map(duplicate(wa), extract) === wa
 *   - Associativity: duplicate(duplicate(wa)) === map(duplicate(wa), duplicate)
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Comonad
// ============================================================================

/**
 * Comonad typeclass - Functor with extract and duplicate
 */
export interface Comonad<W extends TypeFunction> extends Functor<W> {
  readonly extract: <A>(wa: $<W, A>) => A;
  readonly duplicate: <A>(wa: $<W, A>) => $<W, $<W, A>>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Extend - the dual of flatMap: run a context-reading function at every focus
 */
export function extend<W extends TypeFunction>(
  W: Comonad<W>,
): <A, B>(wa: $<W, A>, f: (wa: $<W, A>) => B) => $<W, B> {
  return <A, B>(wa: $<W, A>, f: (wa: $<W, A>) => B): $<W, B> =>
    W.map<$<W, A>, B>(W.duplicate<A>(wa), f);
}

/**
 * Co-Kleisli composition (=>=)
 */
export function coKleisli<W extends TypeFunction>(
  W: Comonad<W>,
): <A, B, C>(f: (wa: $<W, A>) => B, g: (wb: $<W, B>) => C) => (wa: $<W, A>) => C {
  return (f, g) => (wa) => g(extend(W)(wa, f));
}

// ============================================================================
// Instance Creator
// ============================================================================

/**
 * Create a Comonad instance
 */
export function makeComonad<W extends TypeFunction>(
  map: <A, B>(wa: $<W, A>, f: (a: A) => B) => $<W, B>,
  extract: <A>(wa: $<W, A>) => A,
  duplicate: <A>(wa: $<W, A>) => $<W, $<W, A>>,
): Comonad<W> {
  return { map, extract, duplicate };
}
