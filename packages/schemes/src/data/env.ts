/**
 * Env and EnvT Comonads
 *
 * Env<E, A> pairs a focus value with an environment the algebra can read.
 * Zygomorphisms use it to carry the auxiliary fold's result beside the main
 * one: the environment is the helper result, the focus the main result.
 *
 * EnvT<E, W, A> is the same thing stacked on top of another comonad W.
 */

import type { $, EnvF, EnvTF, TypeFunction } from "../hkt.js";
import type { Comonad } from "../typeclasses/comonad.js";

// ============================================================================
// Env
// ============================================================================

/**
 * `[environment, focus]`
 */
export type Env<E, A> = readonly [E, A];

export function env<E, A>(e: E, a: A): Env<E, A> {
  return [e, a];
}

export function ask<E, A>(wa: Env<E, A>): E {
  return wa[0];
}

export function envComonad<E>(): Comonad<EnvF<E>> {
  return {
    map: ([e, a], f) => [e, f(a)],
    extract: ([, a]) => a,
    duplicate: (wa) => [wa[0], wa],
  };
}

// ============================================================================
// EnvT
// ============================================================================

export interface EnvT<E, W extends TypeFunction, A> {
  readonly ask: E;
  readonly lower: $<W, A>;
}

export function envT<E, W extends TypeFunction, A>(ask: E, lower: $<W, A>): EnvT<E, W, A> {
  return { ask, lower };
}

export function envTComonad<E, W extends TypeFunction>(W: Comonad<W>): Comonad<EnvTF<E, W>> {
  const duplicate = <A>(wa: EnvT<E, W, A>): EnvT<E, W, EnvT<E, W, A>> => ({
    ask: wa.ask,
    lower: W.map(W.duplicate(wa.lower), (lower: $<W, A>): EnvT<E, W, A> => ({ ask: wa.ask, lower })),
  });
  return {
    map: (wa, f) => ({ ask: wa.ask, lower: W.map(wa.lower, f) }),
    extract: (wa) => W.extract(wa.lower),
    duplicate,
  };
}
