/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * Right is the "continue" side everywhere in this package:
 *
 * - `apo`: `Left` holds an already-built structure that is embedded as is,
 *   `Right` a seed to keep unfolding.
 * - `elgot`: `Left` short-circuits with a final result, `Right` continues
 *   with a layer of seeds.
 */

import type { EitherF } from "../hkt.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";

// ============================================================================
// Either Type Definition
// ============================================================================

export type Either<E, A> = Left<E> | Right<A>;

export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Pattern match on Either
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return either._tag === "Left" ? onLeft(either.left) : onRight(either.right);
}

export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return either._tag === "Left" ? either : Right(f(either.right));
}

export function flatMap<E, A, B>(either: Either<E, A>, f: (a: A) => Either<E, B>): Either<E, B> {
  return either._tag === "Left" ? either : f(either.right);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function eitherMonad<E>(): Monad<EitherF<E>> {
  return {
    map,
    flatMap,
    pure: (a) => Right(a),
    ap: (fab, fa) => flatMap(fab, (f) => map(fa, f)),
  };
}

export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => {
      if (x._tag === "Left") return y._tag === "Left" && EE.eqv(x.left, y.left);
      return isRight(y) && EA.eqv(x.right, y.right);
    },
  };
}

export function getShow<E, A>(SE: Show<E>, SA: Show<A>): Show<Either<E, A>> {
  return {
    show: (either) =>
      either._tag === "Left" ? `Left(${SE.show(either.left)})` : `Right(${SA.show(either.right)})`,
  };
}
