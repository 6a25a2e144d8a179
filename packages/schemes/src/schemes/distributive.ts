/**
 * Distributive laws
 *
 * A generalized fold over pattern functor F with comonad W needs to push
 * F through W once per layer (`F<W<A>> -> W<F<A>>`); a generalized unfold
 * with monad M needs the opposite (`M<F<A>> -> F<M<A>>`). These are the
 * canonical laws behind the named schemes:
 *
 * | law          | structure    | scheme              |
 * |--------------|--------------|---------------------|
 * | distCata     | Id           | cata                |
 * | distZygo     | Env          | zygo, para          |
 * | distZygoT    | EnvT         | gzygo, gpara        |
 * | distHisto    | Cofree       | histo, chrono       |
 * | distGHisto   | CofreeT      | ghisto, gchrono     |
 * | distAna      | Id           | ana                 |
 * | distApo      | Either       | apo                 |
 * | distGApo     | Either       | gapo                |
 * | distGApoT    | ExceptT      | generalized gapo    |
 * | distFutu     | Free         | futu, chrono        |
 * | distGFutu    | FreeT        | gfutu, gchrono      |
 */

import type {
  $,
  CofreeF,
  CofreeTF,
  EitherF,
  EnvF,
  EnvTF,
  ExceptTF,
  FreeF,
  FreeTF,
  IdF,
  TypeFunction,
} from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { DistributiveLaw } from "../typeclasses/natural.js";
import type { Algebra, Coalgebra, Corecursive, Recursive } from "./recursive.js";
import type { Env, EnvT } from "../data/env.js";
import type { Cofree, CofreeLayer, CofreeT } from "../data/cofree.js";
import type { Free, FreeLayer, FreeT } from "../data/free.js";
import { Pure, Wrap } from "../data/free.js";
import type { Either } from "../data/either.js";
import { Left, Right, isLeft } from "../data/either.js";
import type { ExceptT } from "../data/except.js";

// ============================================================================
// Identity
// ============================================================================

export function distCata<F extends TypeFunction>(): DistributiveLaw<F, IdF> {
  return { distribute: (fa) => fa };
}

export function distAna<F extends TypeFunction>(): DistributiveLaw<IdF, F> {
  return { distribute: (fa) => fa };
}

// ============================================================================
// Zygomorphic (Env / EnvT)
// ============================================================================

/**
 * Runs the auxiliary algebra alongside: the environment of each result is
 * the auxiliary fold of the same subterm.
 */
export function distZygo<F extends TypeFunction, B>(
  F: Functor<F>,
  aux: Algebra<F, B>,
): DistributiveLaw<F, EnvF<B>> {
  return {
    distribute: <A>(fenv: $<F, Env<B, A>>): Env<B, $<F, A>> => [
      aux(F.map(fenv, ([b]: Env<B, A>) => b)),
      F.map(fenv, ([, a]: Env<B, A>) => a),
    ],
  };
}

export function distZygoT<F extends TypeFunction, B, W extends TypeFunction>(
  F: Functor<F>,
  aux: Algebra<F, B>,
  k: DistributiveLaw<F, W>,
): DistributiveLaw<F, EnvTF<B, W>> {
  return {
    distribute: <A>(fenv: $<F, EnvT<B, W, A>>): EnvT<B, W, $<F, A>> => ({
      ask: aux(F.map(fenv, (e: EnvT<B, W, A>) => e.ask)),
      lower: k.distribute<A>(F.map(fenv, (e: EnvT<B, W, A>) => e.lower)),
    }),
  };
}

/**
 * `distZygo` with `embed` as the auxiliary algebra: rebuilds the original
 * subterm.
 */
export function distPara<T, F extends TypeFunction>(C: Corecursive<T, F>): DistributiveLaw<F, EnvF<T>> {
  return distZygo(C.functor, C.embed);
}

export function distParaT<T, F extends TypeFunction, W extends TypeFunction>(
  C: Corecursive<T, F>,
  k: DistributiveLaw<F, W>,
): DistributiveLaw<F, EnvTF<T, W>> {
  return distZygoT(C.functor, C.embed, k);
}

// ============================================================================
// Histomorphic (Cofree / CofreeT)
// ============================================================================

export function distHisto<F extends TypeFunction>(F: Functor<F>): DistributiveLaw<F, CofreeF<F>> {
  const distribute = <A>(fc: $<F, Cofree<F, A>>): Cofree<F, $<F, A>> => ({
    head: F.map(fc, (c: Cofree<F, A>) => c.head),
    tail: F.map(fc, (c: Cofree<F, A>) => distribute(c.tail)),
  });
  return { distribute };
}

export function distGHisto<F extends TypeFunction, H extends TypeFunction>(
  F: Functor<F>,
  H: Functor<H>,
  k: DistributiveLaw<F, H>,
): DistributiveLaw<F, CofreeTF<F, H>> {
  const distribute = <A>(fc: $<F, CofreeT<F, H, A>>): CofreeT<F, H, $<F, A>> => ({
    run: H.map(
      k.distribute<CofreeLayer<F, A, CofreeT<F, H, A>>>(F.map(fc, (c: CofreeT<F, H, A>) => c.run)),
      (
        layers: $<F, CofreeLayer<F, A, CofreeT<F, H, A>>>,
      ): CofreeLayer<F, $<F, A>, CofreeT<F, H, $<F, A>>> => ({
        head: F.map(layers, (l: CofreeLayer<F, A, CofreeT<F, H, A>>) => l.head),
        tail: F.map(layers, (l: CofreeLayer<F, A, CofreeT<F, H, A>>) => distribute(l.tail)),
      }),
    ),
  });
  return { distribute };
}

// ============================================================================
// Futumorphic (Free / FreeT)
// ============================================================================

export function distFutu<F extends TypeFunction>(F: Functor<F>): DistributiveLaw<FreeF<F>, F> {
  const distribute = <A>(free: Free<F, $<F, A>>): $<F, Free<F, A>> =>
    free._tag === "Pure"
      ? F.map(free.value, (a: A): Free<F, A> => Pure(a))
      : F.map(free.layer, (inner: Free<F, $<F, A>>): Free<F, A> => Wrap<F, Free<F, A>>(distribute(inner)));
  return { distribute };
}

export function distGFutu<F extends TypeFunction, H extends TypeFunction>(
  F: Functor<F>,
  H: Functor<H>,
  k: DistributiveLaw<H, F>,
): DistributiveLaw<FreeTF<F, H>, F> {
  const step = <A>(layer: FreeLayer<F, $<F, A>, FreeT<F, H, $<F, A>>>): $<F, FreeLayer<F, A, FreeT<F, H, A>>> =>
    layer._tag === "Pure"
      ? F.map(layer.value, (a: A): FreeLayer<F, A, FreeT<F, H, A>> => Pure(a))
      : F.map(
          layer.layer,
          (inner: FreeT<F, H, $<F, A>>): FreeLayer<F, A, FreeT<F, H, A>> =>
            Wrap<F, FreeT<F, H, A>>(distribute(inner)),
        );
  const distribute = <A>(ft: FreeT<F, H, $<F, A>>): $<F, FreeT<F, H, A>> =>
    F.map(
      k.distribute<FreeLayer<F, A, FreeT<F, H, A>>>(
        H.map(ft.run, (layer: FreeLayer<F, $<F, A>, FreeT<F, H, $<F, A>>>) => step<A>(layer)),
      ),
      (run: $<H, FreeLayer<F, A, FreeT<F, H, A>>>): FreeT<F, H, A> => ({ run }),
    );
  return { distribute };
}

// ============================================================================
// Apomorphic (Either / ExceptT)
// ============================================================================

/**
 * `Left b` keeps unfolding `b` with the auxiliary coalgebra; `Right` layers
 * pass through.
 */
export function distGApo<F extends TypeFunction, B>(
  F: Functor<F>,
  aux: Coalgebra<F, B>,
): DistributiveLaw<EitherF<B>, F> {
  return {
    distribute: <A>(e: Either<B, $<F, A>>): $<F, Either<B, A>> =>
      isLeft(e)
        ? F.map(aux(e.left), (b: B): Either<B, A> => Left(b))
        : F.map(e.right, (a: A): Either<B, A> => Right(a)),
  };
}

/**
 * `distGApo` with `project`: a `Left` holds an already-built value whose
 * layers are copied out one at a time.
 */
export function distApo<T, F extends TypeFunction>(R: Recursive<T, F>): DistributiveLaw<EitherF<T>, F> {
  return distGApo(R.functor, R.project);
}

export function distGApoT<F extends TypeFunction, M extends TypeFunction, B>(
  F: Functor<F>,
  M: Functor<M>,
  aux: Coalgebra<F, B>,
  k: DistributiveLaw<M, F>,
): DistributiveLaw<ExceptTF<B, M>, F> {
  const apo = distGApo(F, aux);
  return {
    distribute: <A>(ex: ExceptT<B, M, $<F, A>>): $<F, ExceptT<B, M, A>> =>
      F.map(
        k.distribute<Either<B, A>>(M.map(ex.run, (e: Either<B, $<F, A>>) => apo.distribute<A>(e))),
        (run: $<M, Either<B, A>>): ExceptT<B, M, A> => ({ run }),
      ),
  };
}
