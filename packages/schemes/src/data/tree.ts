/**
 * Binary trees with values at the leaves
 */

import type { TreeLayerF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { GT, LT, thenCompare } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";

export interface Leaf<A> {
  readonly _tag: "Leaf";
  readonly value: A;
}

export interface Branch<X> {
  readonly _tag: "Branch";
  readonly left: X;
  readonly right: X;
}

export type TreeLayer<A, X> = Leaf<A> | Branch<X>;

export type Tree<A> = Leaf<A> | Branch<Tree<A>>;

export function Leaf<A>(value: A): Leaf<A> {
  return { _tag: "Leaf", value };
}

export function Branch<X>(left: X, right: X): Branch<X> {
  return { _tag: "Branch", left, right };
}

export function treeLayerFunctor<A>(): Functor<TreeLayerF<A>> {
  return {
    map: (layer, f) => (layer._tag === "Leaf" ? layer : Branch(f(layer.left), f(layer.right))),
  };
}

/**
 * A Tree is its own one-layer view.
 */
export function treeBirecursive<A>(): Birecursive<Tree<A>, TreeLayerF<A>> {
  return {
    functor: treeLayerFunctor<A>(),
    project: (tree) => tree,
    embed: (layer) => layer,
  };
}

export function treeLayerEqK<A>(EA: Eq<A>): EqK<TreeLayerF<A>> {
  return {
    liftEq: <X>(EX: Eq<X>): Eq<TreeLayer<A, X>> => ({
      eqv: (x, y) => {
        if (x._tag === "Leaf") return y._tag === "Leaf" && EA.eqv(x.value, y.value);
        return y._tag === "Branch" && EX.eqv(x.left, y.left) && EX.eqv(x.right, y.right);
      },
    }),
  };
}

/**
 * Leaves sort before branches.
 */
export function treeLayerOrdK<A>(OA: Ord<A>): OrdK<TreeLayerF<A>> {
  const eqK = treeLayerEqK(OA);
  return {
    liftEq: eqK.liftEq,
    liftCompare: <X>(OX: Ord<X>): Ord<TreeLayer<A, X>> => ({
      eqv: eqK.liftEq(OX).eqv,
      compare: (x, y) => {
        if (x._tag === "Leaf") return y._tag === "Leaf" ? OA.compare(x.value, y.value) : LT;
        if (y._tag === "Leaf") return GT;
        return thenCompare(OX.compare(x.left, y.left), () => OX.compare(x.right, y.right));
      },
    }),
  };
}

/**
 * Prints `Leaf(<value>)` and `Branch(<left>, <right>)`.
 */
export function treeLayerShowK<A>(SA: Show<A>): ShowK<TreeLayerF<A>> {
  return {
    liftShow: <X>(SX: Show<X>): Show<TreeLayer<A, X>> => ({
      show: (layer) =>
        layer._tag === "Leaf"
          ? `Leaf(${SA.show(layer.value)})`
          : `Branch(${SX.show(layer.left)}, ${SX.show(layer.right)})`,
    }),
  };
}
