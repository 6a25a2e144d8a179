/**
 * ExceptT Monad Transformer
 *
 * ExceptT<E, M, A> wraps `M<Either<E, A>>`: a computation in M that may stop
 * early with an E. Generalized apomorphisms use it to stop unfolding with
 * an already-known seed while still running inside another monad.
 */

import type { $, ExceptTF, TypeFunction } from "../hkt.js";
import type { Monad } from "../typeclasses/monad.js";
import { Left, Right } from "./either.js";
import type { Either } from "./either.js";

export interface ExceptT<E, M extends TypeFunction, A> {
  readonly run: $<M, Either<E, A>>;
}

export function exceptT<E, M extends TypeFunction, A>(run: $<M, Either<E, A>>): ExceptT<E, M, A> {
  return { run };
}

/**
 * Stop with `e` inside M.
 */
export function throwE<E, M extends TypeFunction>(M: Monad<M>): <A>(e: E) => ExceptT<E, M, A> {
  return <A>(e: E): ExceptT<E, M, A> => ({ run: M.pure(Left<E, A>(e)) });
}

export function exceptTMonad<E, M extends TypeFunction>(M: Monad<M>): Monad<ExceptTF<E, M>> {
  const map = <A, B>(fa: ExceptT<E, M, A>, f: (a: A) => B): ExceptT<E, M, B> => ({
    run: M.map(fa.run, (ea: Either<E, A>): Either<E, B> =>
      ea._tag === "Left" ? ea : Right(f(ea.right)),
    ),
  });
  const flatMap = <A, B>(
    fa: ExceptT<E, M, A>,
    f: (a: A) => ExceptT<E, M, B>,
  ): ExceptT<E, M, B> => ({
    run: M.flatMap(fa.run, (ea: Either<E, A>): $<M, Either<E, B>> =>
      ea._tag === "Left" ? M.pure(Left<E, B>(ea.left)) : f(ea.right).run,
    ),
  });
  return {
    map,
    flatMap,
    pure: <A>(a: A): ExceptT<E, M, A> => ({ run: M.pure(Right<E, A>(a)) }),
    ap: (fab, fa) => flatMap(fab, (f) => map(fa, f)),
  };
}
