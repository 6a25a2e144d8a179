/**
 * Sequences and their pattern layer
 *
 * `ListLayer<A, X>` is one cell of a sequence with the tail left open:
 * either `Nil` or `Cons(head, tail: X)`. Two recursive types share it:
 *
 * - `List<A>`: the immutable singly-linked list. A `List<A>` *is* a
 *   `ListLayer<A, List<A>>`, so `project` and `embed` are identities.
 * - `ReadonlyArray<A>`: `project` copies the tail (`slice(1)`), so a
 *   generic fold over an array is quadratic.
 *
 * Both capabilities ship loop-based `cata` and `ana`, so `cata`, `ana`
 * and `histo` run in constant stack depth on either. Other schemes take
 * the generic recursive path.
 */

import type { ListLayerF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { EQ, GT, LT, thenCompare } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Nil variant - end of the sequence
 */
export interface Nil {
  readonly _tag: "Nil";
}

/**
 * Cons variant - a head and the recursive position
 */
export interface Cons<A, X> {
  readonly _tag: "Cons";
  readonly head: A;
  readonly tail: X;
}

export type ListLayer<A, X> = Nil | Cons<A, X>;

/**
 * Immutable singly-linked list
 */
export type List<A> = Nil | Cons<A, List<A>>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * The empty layer (singleton)
 */
export const Nil: Nil = { _tag: "Nil" };

export function Cons<A, X>(head: A, tail: X): Cons<A, X> {
  return { _tag: "Cons", head, tail };
}

/**
 * Create a list from an array
 */
export function fromArray<A>(arr: readonly A[]): List<A> {
  let result: List<A> = Nil;
  for (let i = arr.length - 1; i >= 0; i--) {
    result = Cons(arr[i], result);
  }
  return result;
}

/**
 * Create a list from variadic arguments
 */
export function of<A>(...as: A[]): List<A> {
  return fromArray(as);
}

export function toArray<A>(list: List<A>): A[] {
  const result: A[] = [];
  let current = list;
  while (current._tag === "Cons") {
    result.push(current.head);
    current = current.tail;
  }
  return result;
}

// ============================================================================
// Instances
// ============================================================================

export function listLayerFunctor<A>(): Functor<ListLayerF<A>> {
  return {
    map: (layer, f) => (layer._tag === "Nil" ? layer : Cons(layer.head, f(layer.tail))),
  };
}

export function listBirecursive<A>(): Birecursive<List<A>, ListLayerF<A>> {
  return {
    functor: listLayerFunctor<A>(),
    project: (list) => list,
    embed: (layer) => layer,
    cata: (algebra, list) => {
      const heads = toArray(list);
      let acc = algebra(Nil);
      for (let i = heads.length - 1; i >= 0; i--) {
        acc = algebra(Cons(heads[i], acc));
      }
      return acc;
    },
    ana: (coalgebra, seed) => {
      const heads: A[] = [];
      let layer = coalgebra(seed);
      while (layer._tag === "Cons") {
        heads.push(layer.head);
        layer = coalgebra(layer.tail);
      }
      return fromArray(heads);
    },
  };
}

export function arrayBirecursive<A>(): Birecursive<readonly A[], ListLayerF<A>> {
  return {
    functor: listLayerFunctor<A>(),
    project: (xs) => (xs.length === 0 ? Nil : Cons(xs[0], xs.slice(1))),
    embed: (layer) => (layer._tag === "Nil" ? [] : [layer.head, ...layer.tail]),
    cata: (algebra, xs) => {
      let acc = algebra(Nil);
      for (let i = xs.length - 1; i >= 0; i--) {
        acc = algebra(Cons(xs[i], acc));
      }
      return acc;
    },
    ana: (coalgebra, seed) => {
      const out: A[] = [];
      let layer = coalgebra(seed);
      while (layer._tag === "Cons") {
        out.push(layer.head);
        layer = coalgebra(layer.tail);
      }
      return out;
    },
  };
}

// ============================================================================
// Lifted Eq / Ord / Show
// ============================================================================

export function listLayerEqK<A>(EA: Eq<A>): EqK<ListLayerF<A>> {
  return {
    liftEq: <X>(EX: Eq<X>): Eq<ListLayer<A, X>> => ({
      eqv: (x, y) => {
        if (x._tag === "Nil" || y._tag === "Nil") return x._tag === y._tag;
        return EA.eqv(x.head, y.head) && EX.eqv(x.tail, y.tail);
      },
    }),
  };
}

/**
 * `Nil` sorts before every `Cons`.
 */
export function listLayerOrdK<A>(OA: Ord<A>): OrdK<ListLayerF<A>> {
  return {
    ...listLayerEqK(OA),
    liftCompare: <X>(OX: Ord<X>): Ord<ListLayer<A, X>> => ({
      eqv: listLayerEqK(OA).liftEq(OX).eqv,
      compare: (x, y) => {
        if (x._tag === "Nil") return y._tag === "Nil" ? EQ : LT;
        if (y._tag === "Nil") return GT;
        return thenCompare(OA.compare(x.head, y.head), () => OX.compare(x.tail, y.tail));
      },
    }),
  };
}

/**
 * Prints `Nil` and `Cons(<head>, <tail>)`.
 */
export function listLayerShowK<A>(SA: Show<A>): ShowK<ListLayerF<A>> {
  return {
    liftShow: <X>(SX: Show<X>): Show<ListLayer<A, X>> => ({
      show: (layer) =>
        layer._tag === "Nil" ? "Nil" : `Cons(${SA.show(layer.head)}, ${SX.show(layer.tail)})`,
    }),
  };
}

/**
 * Prints a list as `List(1, 2, 3)`.
 */
export function getShow<A>(S: Show<A>): Show<List<A>> {
  return {
    show: (list) => `List(${toArray(list).map((a) => S.show(a)).join(", ")})`,
  };
}
