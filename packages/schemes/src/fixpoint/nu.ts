/**
 * Nu: the greatest fixed point
 *
 * A `Nu<F>` is a seed of some hidden type together with the coalgebra that
 * unfolds it. Nothing is computed until `project` asks for the next layer,
 * so a Nu may be infinite: a stream of every natural number is just
 * `Nu((n) => ({ head: n, tail: n + 1 }), 0)`.
 *
 * `ana` is the constructor itself. Folding an infinite Nu does not
 * terminate; consume it with a bounded consumer instead (`takeStream`).
 */

import type { $, TypeFunction } from "../hkt.js";
import { packExists } from "@refold/type-system";
import type { Exists } from "@refold/type-system";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { eqBy, ordBy } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { NaturalTransformation } from "../typeclasses/natural.js";
import type { Birecursive, Coalgebra } from "../schemes/recursive.js";
import { toFix } from "../schemes/convert.js";
import { fixEq, fixOrd, fixShow } from "./fix.js";

/**
 * The hidden state of a Nu: a seed and how to step it.
 */
export interface NuState<F extends TypeFunction, S> {
  readonly step: Coalgebra<F, S>;
  readonly seed: S;
}

export interface NuStateF<F extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: NuState<F, this["__kind__"]>;
}

export type Nu<F extends TypeFunction> = Exists<NuStateF<F>>;

export function Nu<F extends TypeFunction, S>(step: Coalgebra<F, S>, seed: S): Nu<F> {
  return packExists<NuStateF<F>, S>({ step, seed });
}

export function nuBirecursive<F extends TypeFunction>(F: Functor<F>): Birecursive<Nu<F>, F> {
  const project = (nu: Nu<F>): $<F, Nu<F>> =>
    nu.use<$<F, Nu<F>>>(<S>(state: NuState<F, S>) =>
      F.map(state.step(state.seed), (next: S) => Nu<F, S>(state.step, next)),
    );
  return {
    functor: F,
    project,
    // colambek: the layer becomes the seed, and stepping it projects the children
    embed: (layer) => Nu<F, $<F, Nu<F>>>((l: $<F, Nu<F>>) => F.map(l, project), layer),
    ana: <A>(coalgebra: Coalgebra<F, A>, seed: A): Nu<F> => Nu<F, A>(coalgebra, seed),
  };
}

/**
 * `hoist` without unfolding: the transformation is composed into the step.
 */
export function hoistNu<F extends TypeFunction, G extends TypeFunction>(
  n: NaturalTransformation<F, G>,
): (nu: Nu<F>) => Nu<G> {
  return (nu) =>
    nu.use<Nu<G>>(<S>(state: NuState<F, S>) =>
      Nu<G, S>((seed: S) => n.transform<S>(state.step(seed)), state.seed),
    );
}

// ============================================================================
// Eq / Ord / Show (through Fix, finite values only)
// ============================================================================

export function nuEq<F extends TypeFunction>(F: Functor<F>, E: EqK<F>): Eq<Nu<F>> {
  return eqBy(fixEq(E), toFix(nuBirecursive(F)));
}

export function nuOrd<F extends TypeFunction>(F: Functor<F>, O: OrdK<F>): Ord<Nu<F>> {
  return ordBy(fixOrd(O), toFix(nuBirecursive(F)));
}

/**
 * Prints `fromFix(<fix>)`.
 */
export function nuShow<F extends TypeFunction>(F: Functor<F>, S: ShowK<F>): Show<Nu<F>> {
  const toFixNu = toFix(nuBirecursive(F));
  const showFix = fixShow(S);
  return { show: (nu) => `fromFix(${showFix.show(toFixNu(nu))})` };
}
