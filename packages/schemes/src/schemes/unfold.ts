/**
 * Unfolds
 *
 * Every unfold builds a value of a Corecursive type one layer at a time,
 * top-down, from a seed. They differ in what the coalgebra may put at each
 * recursive position:
 *
 * | scheme   | recursive position holds                                  |
 * |----------|-----------------------------------------------------------|
 * | ana      | the next seed                                             |
 * | apo      | the next seed, or a finished value to embed as is         |
 * | futu     | the next seed, or several layers produced at once         |
 * | gana     | the next seed inside any monad, via a distributive law    |
 */

import type { $, EitherF, FreeF, FreeTF, TypeFunction } from "../hkt.js";
import type { Monad } from "../typeclasses/monad.js";
import { flatten } from "../typeclasses/monad.js";
import type { DistributiveLaw, NaturalTransformation } from "../typeclasses/natural.js";
import type { Birecursive, Coalgebra, Corecursive, GCoalgebra } from "./recursive.js";
import type { Either } from "../data/either.js";
import { eitherMonad, isLeft } from "../data/either.js";
import type { Free } from "../data/free.js";
import { freeMonad, freeTMonad } from "../data/free.js";
import { distFutu, distGApo, distGFutu } from "./distributive.js";
import { cata } from "./fold.js";

/**
 * Coalgebra of an apomorphism: `Left` is a finished value, `Right` a seed.
 */
export type RCoalgebra<F extends TypeFunction, T, A> = (a: A) => $<F, Either<T, A>>;

/**
 * Coalgebra of a futumorphism: `Wrap` emits a layer, `Pure` a seed.
 */
export type CVCoalgebra<F extends TypeFunction, A> = (a: A) => $<F, Free<F, A>>;

// ============================================================================
// ana
// ============================================================================

/**
 * Anamorphism: build a structure top-down from a seed.
 *
 * Uses the capability's own `ana` when it has one, so unfolding into a
 * lazy type (`Nu`) does not force it.
 */
export function ana<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <A>(coalgebra: Coalgebra<F, A>) => (seed: A) => T {
  return <A>(coalgebra: Coalgebra<F, A>) => {
    const specialized = C.ana;
    if (specialized !== undefined) {
      return (seed: A): T => specialized(coalgebra, seed);
    }
    const go = (seed: A): T => C.embed(C.functor.map(coalgebra(seed), go));
    return go;
  };
}

// ============================================================================
// gana
// ============================================================================

/**
 * Generalized anamorphism over the monad M.
 */
export function gana<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <M extends TypeFunction, A>(
  M: Monad<M>,
  k: DistributiveLaw<M, F>,
  coalgebra: GCoalgebra<F, M, A>,
) => (seed: A) => T {
  return <M extends TypeFunction, A>(
    M: Monad<M>,
    k: DistributiveLaw<M, F>,
    coalgebra: GCoalgebra<F, M, A>,
  ) => {
    const join = flatten(M);
    const a = (mfma: $<M, $<F, $<M, A>>>): T =>
      C.embed(
        C.functor.map(k.distribute<$<M, A>>(mfma), (mma: $<M, $<M, A>>) =>
          a(M.map(join(mma), coalgebra)),
        ),
      );
    return (seed: A): T => a(M.pure(coalgebra(seed)));
  };
}

// ============================================================================
// apo / gapo
// ============================================================================

/**
 * Apomorphism: a coalgebra step may end a branch early by handing back an
 * already-built value (`Left`), which is embedded without further unfolding.
 *
 * @example
 * ```typescript
 * // Insert 3 into a sorted list, reusing the untouched tail
 * apo(listBirecursive<number>())((xs: List<number>) =>
 *   xs._tag === "Nil" || xs.head >= 3 ? Cons(3, Left(xs)) : Cons(xs.head, Right(xs.tail)),
 * )(fromArray([1, 2, 4]));
 * ```
 */
export function apo<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <A>(coalgebra: RCoalgebra<F, T, A>) => (seed: A) => T {
  return <A>(coalgebra: RCoalgebra<F, T, A>) => {
    const go = (seed: A): T =>
      C.embed(
        C.functor.map(coalgebra(seed), (e: Either<T, A>) => (isLeft(e) ? e.left : go(e.right))),
      );
    return go;
  };
}

/**
 * Generalized apomorphism: `Left` seeds continue with the auxiliary
 * coalgebra `aux` instead of stopping.
 */
export function gapo<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <B, A>(aux: Coalgebra<F, B>, coalgebra: (a: A) => $<F, Either<B, A>>) => (seed: A) => T {
  return <B, A>(aux: Coalgebra<F, B>, coalgebra: (a: A) => $<F, Either<B, A>>) =>
    gana(C)<EitherF<B>, A>(eitherMonad<B>(), distGApo(C.functor, aux), coalgebra);
}

// ============================================================================
// futu / gfutu
// ============================================================================

/**
 * Futumorphism: a coalgebra step may emit several layers at once.
 */
export function futu<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <A>(coalgebra: CVCoalgebra<F, A>) => (seed: A) => T {
  return <A>(coalgebra: CVCoalgebra<F, A>) =>
    gana(C)<FreeF<F>, A>(freeMonad(C.functor), distFutu(C.functor), coalgebra);
}

export function gfutu<T, F extends TypeFunction>(
  C: Corecursive<T, F>,
): <M extends TypeFunction, A>(
  M: Monad<M>,
  k: DistributiveLaw<M, F>,
  coalgebra: GCoalgebra<F, FreeTF<F, M>, A>,
) => (seed: A) => T {
  return <M extends TypeFunction, A>(
    M: Monad<M>,
    k: DistributiveLaw<M, F>,
    coalgebra: GCoalgebra<F, FreeTF<F, M>, A>,
  ) =>
    gana(C)<FreeTF<F, M>, A>(freeTMonad(C.functor, M), distGFutu(C.functor, M, k), coalgebra);
}

// ============================================================================
// postpro / gpostpro
// ============================================================================

/**
 * Postpromorphism: after a subterm is built, `e` is applied to every layer
 * of it. The dual of `prepro`.
 */
export function postpro<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <A>(e: NaturalTransformation<F, F>, coalgebra: Coalgebra<F, A>) => (seed: A) => T {
  return <A>(e: NaturalTransformation<F, F>, coalgebra: Coalgebra<F, A>) => {
    const rewrite = cata(B)<T>((layer: $<F, T>) => B.embed(e.transform<T>(layer)));
    const a = (seed: A): T => B.embed(B.functor.map(coalgebra(seed), (next: A) => rewrite(a(next))));
    return a;
  };
}

export function gpostpro<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <M extends TypeFunction, A>(
  M: Monad<M>,
  k: DistributiveLaw<M, F>,
  e: NaturalTransformation<F, F>,
  coalgebra: GCoalgebra<F, M, A>,
) => (seed: A) => T {
  return <M extends TypeFunction, A>(
    M: Monad<M>,
    k: DistributiveLaw<M, F>,
    e: NaturalTransformation<F, F>,
    coalgebra: GCoalgebra<F, M, A>,
  ) => {
    const join = flatten(M);
    const rewrite = cata(B)<T>((layer: $<F, T>) => B.embed(e.transform<T>(layer)));
    const a = (ma: $<M, A>): T =>
      B.embed(
        B.functor.map(k.distribute<$<M, A>>(M.map(ma, coalgebra)), (mma: $<M, $<M, A>>) =>
          rewrite(a(join(mma))),
        ),
      );
    return (seed: A): T => a(M.pure(seed));
  };
}
