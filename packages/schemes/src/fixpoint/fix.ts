/**
 * Fix: the direct fixed point
 *
 * `Fix<F>` ties the knot of a pattern functor with a plain wrapper: each
 * node holds one layer whose recursive positions are again `Fix<F>`. It is
 * the canonical representation every other encoding converts to and from.
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";

export interface Fix<F extends TypeFunction> {
  readonly unfix: $<F, Fix<F>>;
}

export function Fix<F extends TypeFunction>(layer: $<F, Fix<F>>): Fix<F> {
  return { unfix: layer };
}

export function unfix<F extends TypeFunction>(fix: Fix<F>): $<F, Fix<F>> {
  return fix.unfix;
}

export function fixBirecursive<F extends TypeFunction>(F: Functor<F>): Birecursive<Fix<F>, F> {
  return {
    functor: F,
    project: unfix,
    embed: Fix,
  };
}

// ============================================================================
// Eq / Ord / Show
// ============================================================================

/**
 * Structural equality, one layer at a time.
 */
export function fixEq<F extends TypeFunction>(E: EqK<F>): Eq<Fix<F>> {
  const eq: Eq<Fix<F>> = {
    eqv: (x, y) => E.liftEq(eq).eqv(x.unfix, y.unfix),
  };
  return eq;
}

export function fixOrd<F extends TypeFunction>(O: OrdK<F>): Ord<Fix<F>> {
  const ord: Ord<Fix<F>> = {
    eqv: (x, y) => O.liftEq(ord).eqv(x.unfix, y.unfix),
    compare: (x, y) => O.liftCompare(ord).compare(x.unfix, y.unfix),
  };
  return ord;
}

/**
 * Prints `Fix(<layer>)`.
 */
export function fixShow<F extends TypeFunction>(S: ShowK<F>): Show<Fix<F>> {
  const show: Show<Fix<F>> = {
    show: (fix) => `Fix(${S.liftShow(show).show(fix.unfix)})`,
  };
  return show;
}
