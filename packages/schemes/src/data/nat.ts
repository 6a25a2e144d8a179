/**
 * Natural numbers as a recursive type
 *
 * `NatLayer<X>` is Peano's view of a number: `Zero`, or `Succ` of a
 * predecessor. Non-negative integers (`number`) are Birecursive over it.
 */

import type { NatLayerF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { EQ, GT, LT } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";
import { PreconditionError } from "../errors.js";

// ============================================================================
// Type Definitions
// ============================================================================

export interface Zero {
  readonly _tag: "Zero";
}

export interface Succ<X> {
  readonly _tag: "Succ";
  readonly pred: X;
}

export type NatLayer<X> = Zero | Succ<X>;

// ============================================================================
// Constructors
// ============================================================================

export const Zero: Zero = { _tag: "Zero" };

export function Succ<X>(pred: X): Succ<X> {
  return { _tag: "Succ", pred };
}

function assertNatural(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new PreconditionError(`Expected a non-negative integer, got ${n}`, n);
  }
}

// ============================================================================
// Instances
// ============================================================================

export const natLayerFunctor: Functor<NatLayerF> = {
  map: (layer, f) => (layer._tag === "Zero" ? layer : Succ(f(layer.pred))),
};

/**
 * `project` throws `PreconditionError` on negative or fractional input
 * instead of recursing forever.
 */
export const natBirecursive: Birecursive<number, NatLayerF> = {
  functor: natLayerFunctor,
  project: (n) => {
    assertNatural(n);
    return n === 0 ? Zero : Succ(n - 1);
  },
  embed: (layer) => (layer._tag === "Zero" ? 0 : layer.pred + 1),
  cata: (algebra, n) => {
    assertNatural(n);
    let acc = algebra(Zero);
    for (let i = 0; i < n; i++) {
      acc = algebra(Succ(acc));
    }
    return acc;
  },
};

// ============================================================================
// Lifted Eq / Ord / Show
// ============================================================================

export const natLayerEqK: EqK<NatLayerF> = {
  liftEq: <X>(EX: Eq<X>): Eq<NatLayer<X>> => ({
    eqv: (x, y) => {
      if (x._tag === "Zero" || y._tag === "Zero") return x._tag === y._tag;
      return EX.eqv(x.pred, y.pred);
    },
  }),
};

export const natLayerOrdK: OrdK<NatLayerF> = {
  liftEq: natLayerEqK.liftEq,
  liftCompare: <X>(OX: Ord<X>): Ord<NatLayer<X>> => ({
    eqv: natLayerEqK.liftEq(OX).eqv,
    compare: (x, y) => {
      if (x._tag === "Zero") return y._tag === "Zero" ? EQ : LT;
      if (y._tag === "Zero") return GT;
      return OX.compare(x.pred, y.pred);
    },
  }),
};

/**
 * Prints `Zero` and `Succ(<pred>)`.
 */
export const natLayerShowK: ShowK<NatLayerF> = {
  liftShow: <X>(SX: Show<X>): Show<NatLayer<X>> => ({
    show: (layer) => (layer._tag === "Zero" ? "Zero" : `Succ(${SX.show(layer.pred)})`),
  }),
};
