/**
 * Mu: the least fixed point, Church encoded
 *
 * A `Mu<F>` *is* its own fold: it stores no layers, only a function that
 * runs any algebra over the structure it stands for. `cata` is a single
 * call; `project` has to refold the whole value (`lambek`) and costs a
 * full traversal.
 *
 * Mu values are always finite.
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { eqBy, ordBy } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { NaturalTransformation } from "../typeclasses/natural.js";
import type { Algebra, Birecursive } from "../schemes/recursive.js";
import { toFix } from "../schemes/convert.js";
import { fixEq, fixOrd, fixShow } from "./fix.js";

export interface Mu<F extends TypeFunction> {
  fold<A>(algebra: Algebra<F, A>): A;
}

export function muBirecursive<F extends TypeFunction>(F: Functor<F>): Birecursive<Mu<F>, F> {
  const embed = (layer: $<F, Mu<F>>): Mu<F> => ({
    fold: <A>(algebra: Algebra<F, A>): A =>
      algebra(F.map(layer, (child: Mu<F>) => child.fold(algebra))),
  });
  return {
    functor: F,
    project: (mu) => mu.fold<$<F, Mu<F>>>((layer: $<F, $<F, Mu<F>>>) => F.map(layer, embed)),
    embed,
    cata: (algebra, mu) => mu.fold(algebra),
  };
}

/**
 * `hoist` without rebuilding: the transformation is pushed into the fold.
 */
export function hoistMu<F extends TypeFunction, G extends TypeFunction>(
  n: NaturalTransformation<F, G>,
): (mu: Mu<F>) => Mu<G> {
  return (mu) => ({
    fold: <A>(algebra: Algebra<G, A>): A => mu.fold<A>((layer: $<F, A>) => algebra(n.transform<A>(layer))),
  });
}

// ============================================================================
// Eq / Ord / Show (through Fix)
// ============================================================================

export function muEq<F extends TypeFunction>(F: Functor<F>, E: EqK<F>): Eq<Mu<F>> {
  return eqBy(fixEq(E), toFix(muBirecursive(F)));
}

export function muOrd<F extends TypeFunction>(F: Functor<F>, O: OrdK<F>): Ord<Mu<F>> {
  return ordBy(fixOrd(O), toFix(muBirecursive(F)));
}

/**
 * Prints `fromFix(<fix>)`.
 */
export function muShow<F extends TypeFunction>(F: Functor<F>, S: ShowK<F>): Show<Mu<F>> {
  const toFixMu = toFix(muBirecursive(F));
  const showFix = fixShow(S);
  return { show: (mu) => `fromFix(${showFix.show(toFixMu(mu))})` };
}
