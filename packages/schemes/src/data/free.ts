/**
 * Free Monad
 *
 * A Free<F, A> is an F-shaped tree whose leaves are either A values (`Pure`)
 * or further layers (`Wrap`). As the monad of a futumorphism, a coalgebra
 * step can return several layers at once: `Wrap` layers are emitted
 * directly, and unfolding resumes at each `Pure` seed.
 *
 * FreeT<F, M, A> interleaves another monad M at every step.
 */

import type { $, FreeF, FreeLayerF, FreeTF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Birecursive } from "../schemes/recursive.js";

// ============================================================================
// Free
// ============================================================================

export interface Pure<A> {
  readonly _tag: "Pure";
  readonly value: A;
}

export interface WrapLayer<F extends TypeFunction, X> {
  readonly _tag: "Wrap";
  readonly layer: $<F, X>;
}

/**
 * One step of a Free with the recursive position left open.
 */
export type FreeLayer<F extends TypeFunction, A, X> = Pure<A> | WrapLayer<F, X>;

export type Free<F extends TypeFunction, A> = Pure<A> | WrapLayer<F, Free<F, A>>;

/**
 * Stop emitting layers and resume unfolding at `value`.
 */
export function Pure<A>(value: A): Pure<A> {
  return { _tag: "Pure", value };
}

/**
 * Emit one layer directly.
 */
export function Wrap<F extends TypeFunction, X>(layer: $<F, X>): WrapLayer<F, X> {
  return { _tag: "Wrap", layer };
}

export function freeMonad<F extends TypeFunction>(F: Functor<F>): Monad<FreeF<F>> {
  const map = <A, B>(fa: Free<F, A>, f: (a: A) => B): Free<F, B> =>
    fa._tag === "Pure"
      ? Pure(f(fa.value))
      : Wrap<F, Free<F, B>>(F.map(fa.layer, (inner: Free<F, A>) => map(inner, f)));
  const flatMap = <A, B>(fa: Free<F, A>, f: (a: A) => Free<F, B>): Free<F, B> =>
    fa._tag === "Pure"
      ? f(fa.value)
      : Wrap<F, Free<F, B>>(F.map(fa.layer, (inner: Free<F, A>) => flatMap(inner, f)));
  return {
    map,
    flatMap,
    pure: Pure,
    ap: (fab, fa) => flatMap(fab, (f) => map(fa, f)),
  };
}

export function freeLayerFunctor<F extends TypeFunction, A>(F: Functor<F>): Functor<FreeLayerF<F, A>> {
  return {
    map: <X, Y>(layer: FreeLayer<F, A, X>, f: (x: X) => Y): FreeLayer<F, A, Y> =>
      layer._tag === "Pure" ? layer : Wrap<F, Y>(F.map(layer.layer, f)),
  };
}

/**
 * A Free is its own one-layer view: `project` and `embed` are identities.
 */
export function freeBirecursive<F extends TypeFunction, A>(
  F: Functor<F>,
): Birecursive<Free<F, A>, FreeLayerF<F, A>> {
  return {
    functor: freeLayerFunctor(F),
    project: (t) => t,
    embed: (layer) => layer,
  };
}

// ============================================================================
// FreeT
// ============================================================================

export interface FreeT<F extends TypeFunction, M extends TypeFunction, A> {
  readonly run: $<M, FreeLayer<F, A, FreeT<F, M, A>>>;
}

/**
 * `Pure` step of a FreeT.
 */
export function freeTPure<M extends TypeFunction>(
  M: Monad<M>,
): <F extends TypeFunction, A>(a: A) => FreeT<F, M, A> {
  return <F extends TypeFunction, A>(a: A): FreeT<F, M, A> => ({
    run: M.pure<FreeLayer<F, A, FreeT<F, M, A>>>(Pure(a)),
  });
}

/**
 * `Wrap` step of a FreeT.
 */
export function freeTWrap<M extends TypeFunction>(
  M: Monad<M>,
): <F extends TypeFunction, A>(layer: $<F, FreeT<F, M, A>>) => FreeT<F, M, A> {
  return <F extends TypeFunction, A>(layer: $<F, FreeT<F, M, A>>): FreeT<F, M, A> => ({
    run: M.pure<FreeLayer<F, A, FreeT<F, M, A>>>(Wrap<F, FreeT<F, M, A>>(layer)),
  });
}

export function freeTMonad<F extends TypeFunction, M extends TypeFunction>(
  F: Functor<F>,
  M: Monad<M>,
): Monad<FreeTF<F, M>> {
  const map = <A, B>(fa: FreeT<F, M, A>, f: (a: A) => B): FreeT<F, M, B> => ({
    run: M.map(
      fa.run,
      (step: FreeLayer<F, A, FreeT<F, M, A>>): FreeLayer<F, B, FreeT<F, M, B>> =>
        step._tag === "Pure"
          ? Pure(f(step.value))
          : Wrap<F, FreeT<F, M, B>>(F.map(step.layer, (inner: FreeT<F, M, A>) => map(inner, f))),
    ),
  });
  const flatMap = <A, B>(fa: FreeT<F, M, A>, f: (a: A) => FreeT<F, M, B>): FreeT<F, M, B> => ({
    run: M.flatMap(
      fa.run,
      (step: FreeLayer<F, A, FreeT<F, M, A>>): $<M, FreeLayer<F, B, FreeT<F, M, B>>> =>
        step._tag === "Pure"
          ? f(step.value).run
          : M.pure<FreeLayer<F, B, FreeT<F, M, B>>>(
              Wrap<F, FreeT<F, M, B>>(
                F.map(step.layer, (inner: FreeT<F, M, A>) => flatMap(inner, f)),
              ),
            ),
    ),
  });
  return {
    map,
    flatMap,
    pure: <A>(a: A): FreeT<F, M, A> => ({ run: M.pure<FreeLayer<F, A, FreeT<F, M, A>>>(Pure(a)) }),
    ap: (fab, fa) => flatMap(fab, (f) => map(fa, f)),
  };
}
