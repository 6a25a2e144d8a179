/**
 * Non-empty sequences
 *
 * `NonEmptyLayer<A, X>` ends in `Last(head)` rather than an empty cell, so
 * the fold over it needs no seed value: a maximum or a reduce without an
 * initial accumulator is just `cata`.
 */

import type { NonEmptyLayerF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { EQ, GT, LT, thenCompare } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";

export interface Last<A> {
  readonly _tag: "Last";
  readonly head: A;
}

export interface More<A, X> {
  readonly _tag: "More";
  readonly head: A;
  readonly tail: X;
}

export type NonEmptyLayer<A, X> = Last<A> | More<A, X>;

export type NonEmptyArray<A> = readonly [A, ...A[]];

export function Last<A>(head: A): Last<A> {
  return { _tag: "Last", head };
}

export function More<A, X>(head: A, tail: X): More<A, X> {
  return { _tag: "More", head, tail };
}

export function isNonEmpty<A>(xs: readonly A[]): xs is NonEmptyArray<A> {
  return xs.length > 0;
}

export function nonEmptyLayerFunctor<A>(): Functor<NonEmptyLayerF<A>> {
  return {
    map: (layer, f) => (layer._tag === "Last" ? layer : More(layer.head, f(layer.tail))),
  };
}

export function nonEmptyBirecursive<A>(): Birecursive<NonEmptyArray<A>, NonEmptyLayerF<A>> {
  return {
    functor: nonEmptyLayerFunctor<A>(),
    project: ([head, ...rest]) => (isNonEmpty(rest) ? More(head, rest) : Last(head)),
    embed: (layer) => (layer._tag === "Last" ? [layer.head] : [layer.head, ...layer.tail]),
  };
}

export function nonEmptyLayerEqK<A>(EA: Eq<A>): EqK<NonEmptyLayerF<A>> {
  return {
    liftEq: <X>(EX: Eq<X>): Eq<NonEmptyLayer<A, X>> => ({
      eqv: (x, y) => {
        if (x._tag === "Last") return y._tag === "Last" && EA.eqv(x.head, y.head);
        return y._tag === "More" && EA.eqv(x.head, y.head) && EX.eqv(x.tail, y.tail);
      },
    }),
  };
}

/**
 * Compares heads first; on a tie `Last` sorts before `More`.
 */
export function nonEmptyLayerOrdK<A>(OA: Ord<A>): OrdK<NonEmptyLayerF<A>> {
  const eqK = nonEmptyLayerEqK(OA);
  return {
    liftEq: eqK.liftEq,
    liftCompare: <X>(OX: Ord<X>): Ord<NonEmptyLayer<A, X>> => ({
      eqv: eqK.liftEq(OX).eqv,
      compare: (x, y) =>
        thenCompare(OA.compare(x.head, y.head), () => {
          if (x._tag === "Last") return y._tag === "Last" ? EQ : LT;
          if (y._tag === "Last") return GT;
          return OX.compare(x.tail, y.tail);
        }),
    }),
  };
}

export function nonEmptyLayerShowK<A>(SA: Show<A>): ShowK<NonEmptyLayerF<A>> {
  return {
    liftShow: <X>(SX: Show<X>): Show<NonEmptyLayer<A, X>> => ({
      show: (layer) =>
        layer._tag === "Last"
          ? `Last(${SA.show(layer.head)})`
          : `More(${SA.show(layer.head)}, ${SX.show(layer.tail)})`,
    }),
  };
}
