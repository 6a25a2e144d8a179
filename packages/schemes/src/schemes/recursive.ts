/**
 * Recursive / Corecursive capabilities
 *
 * A type `T` is Recursive over the pattern functor `F` when it can be taken
 * apart one layer at a time (`project`), and Corecursive when it can be
 * built one layer at a time (`embed`). The pattern functor is a parameter
 * of the capability together with its Functor instance, so a capability
 * value is everything a scheme needs to know about `T`.
 *
 * Instances are expected to satisfy Lambek's lemma:
 *
 *   project(embed(layer)) ≡ layer
 *   embed(project(t))     ≡ t
 *
 * Nothing checks this at runtime; `roundTripLaws` in the laws module does.
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";

// ============================================================================
// Algebras
// ============================================================================

/**
 * Collapse one layer whose recursive positions already hold results.
 */
export type Algebra<F extends TypeFunction, A> = (fa: $<F, A>) => A;

/**
 * Produce one layer whose recursive positions hold new seeds.
 */
export type Coalgebra<F extends TypeFunction, A> = (a: A) => $<F, A>;

/**
 * An algebra whose recursive positions are wrapped in the comonad W.
 */
export type GAlgebra<F extends TypeFunction, W extends TypeFunction, A> = (fwa: $<F, $<W, A>>) => A;

/**
 * A coalgebra whose recursive positions are wrapped in the monad M.
 */
export type GCoalgebra<F extends TypeFunction, M extends TypeFunction, A> = (a: A) => $<F, $<M, A>>;

// ============================================================================
// Capabilities
// ============================================================================

export interface Recursive<T, F extends TypeFunction> {
  readonly functor: Functor<F>;
  readonly project: (t: T) => $<F, T>;
  /**
   * Optional specialized fold. `cata` uses it instead of the generic
   * project-and-recurse loop when present.
   */
  readonly cata?: <A>(algebra: Algebra<F, A>, t: T) => A;
}

export interface Corecursive<T, F extends TypeFunction> {
  readonly functor: Functor<F>;
  readonly embed: (layer: $<F, T>) => T;
  /**
   * Optional specialized unfold, used by `ana` when present.
   */
  readonly ana?: <A>(coalgebra: Coalgebra<F, A>, seed: A) => T;
}

export interface Birecursive<T, F extends TypeFunction> extends Recursive<T, F>, Corecursive<T, F> {}

// ============================================================================
// Instance Creators
// ============================================================================

export function makeRecursive<T, F extends TypeFunction>(
  functor: Functor<F>,
  project: (t: T) => $<F, T>,
): Recursive<T, F> {
  return { functor, project };
}

export function makeCorecursive<T, F extends TypeFunction>(
  functor: Functor<F>,
  embed: (layer: $<F, T>) => T,
): Corecursive<T, F> {
  return { functor, embed };
}

export function makeBirecursive<T, F extends TypeFunction>(
  functor: Functor<F>,
  project: (t: T) => $<F, T>,
  embed: (layer: $<F, T>) => T,
): Birecursive<T, F> {
  return { functor, project, embed };
}
