/**
 * Laws for recursive types and their schemes
 *
 * `project` and `embed` are a trust contract: nothing checks them when a
 * capability is built. These law sets are how a capability is checked.
 *
 * @module
 */

import type { $, IdF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Algebra, Birecursive, Coalgebra, Corecursive, Recursive } from "../schemes/recursive.js";
import { cata, gcata, histo, para } from "../schemes/fold.js";
import { ana, apo, gana } from "../schemes/unfold.js";
import { hylo } from "../schemes/refold.js";
import { distAna, distCata } from "../schemes/distributive.js";
import { idComonad, idMonad } from "../data/id.js";
import { Right } from "../data/either.js";
import type { Cofree } from "../data/cofree.js";
import type { LawSet } from "./types.js";

/**
 * Lambek's lemma in both directions, stated over a generated `t`.
 */
export function roundTripLaws<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
  EqT: Eq<T>,
  EqFT: Eq<$<F, T>>,
): LawSet<T> {
  return [
    {
      name: "embed after project",
      arity: 1,
      proofHint: "round-trip",
      description: "embed(project(t)) === t",
      check: (t) => EqT.eqv(B.embed(B.project(t)), t),
    },
    {
      name: "project after embed",
      arity: 1,
      proofHint: "round-trip",
      description: "project(embed(layer)) === layer, for layer = project(t)",
      check: (t) => {
        const layer = B.project(t);
        return EqFT.eqv(B.project(B.embed(layer)), layer);
      },
    },
  ];
}

/**
 * Folding with `embed` and unfolding with `project` rebuild the input.
 */
export function identityFoldLaws<T, F extends TypeFunction>(B: Birecursive<T, F>, EqT: Eq<T>): LawSet<T> {
  return [
    {
      name: "cata embed",
      arity: 1,
      proofHint: "identity-left",
      description: "cata(embed)(t) === t",
      check: (t) => EqT.eqv(cata(B)<T>(B.embed)(t), t),
    },
    {
      name: "ana project",
      arity: 1,
      proofHint: "identity-right",
      description: "ana(project)(t) === t",
      check: (t) => EqT.eqv(ana(B)<T>(B.project)(t), t),
    },
  ];
}

/**
 * `hylo` agrees with unfolding into `T` and folding back, for seeds whose
 * unfolding is finite.
 */
export function fusionLaws<T, F extends TypeFunction, A, B>(
  F: Functor<F>,
  R: Recursive<T, F>,
  C: Corecursive<T, F>,
  algebra: Algebra<F, B>,
  coalgebra: Coalgebra<F, A>,
  EqB: Eq<B>,
): LawSet<A> {
  const fused = hylo(F)<A, B>(algebra, coalgebra);
  const unfold = ana(C)<A>(coalgebra);
  const fold = cata(R)<B>(algebra);
  return [
    {
      name: "hylo fusion",
      arity: 1,
      proofHint: "fusion",
      description: "hylo(alg, coalg)(a) === cata(alg)(ana(coalg)(a))",
      check: (seed) => EqB.eqv(fused(seed), fold(unfold(seed))),
    },
  ];
}

/**
 * The named schemes are their generalized forms under the canonical laws,
 * and the richer folds and unfolds reduce to the plain ones when the extra
 * information is ignored.
 */
export function generalizationLaws<T, F extends TypeFunction, A>(
  B: Birecursive<T, F>,
  algebra: Algebra<F, A>,
  coalgebra: Coalgebra<F, T>,
  EqA: Eq<A>,
  EqT: Eq<T>,
): LawSet<T> {
  const F = B.functor;
  const fold = cata(B)<A>(algebra);
  const unfold = ana(B)<T>(coalgebra);
  const gfold = gcata(B)<IdF, A>(idComonad, distCata<F>(), algebra);
  const gunfold = gana(B)<IdF, T>(idMonad, distAna<F>(), coalgebra);
  const paraFold = para(B)<A>((layer) => algebra(F.map(layer, ([, a]: readonly [T, A]) => a)));
  const histoFold = histo(B)<A>((layer) => algebra(F.map(layer, (c: Cofree<F, A>) => c.head)));
  const apoUnfold = apo(B)<T>((seed: T) => F.map(coalgebra(seed), (next: T) => Right<T, T>(next)));
  return [
    {
      name: "gcata with distCata",
      arity: 1,
      proofHint: "specialization",
      description: "gcata(Id, distCata, alg)(t) === cata(alg)(t)",
      check: (t) => EqA.eqv(gfold(t), fold(t)),
    },
    {
      name: "gana with distAna",
      arity: 1,
      proofHint: "specialization",
      description: "gana(Id, distAna, coalg)(t) === ana(coalg)(t)",
      check: (t) => EqT.eqv(gunfold(t), unfold(t)),
    },
    {
      name: "para forgetting subterms",
      arity: 1,
      proofHint: "specialization",
      description: "para(layer => alg(map(layer, snd)))(t) === cata(alg)(t)",
      check: (t) => EqA.eqv(paraFold(t), fold(t)),
    },
    {
      name: "histo reading heads",
      arity: 1,
      proofHint: "specialization",
      description: "histo(layer => alg(map(layer, c => c.head)))(t) === cata(alg)(t)",
      check: (t) => EqA.eqv(histoFold(t), fold(t)),
    },
    {
      name: "apo never stopping",
      arity: 1,
      proofHint: "specialization",
      description: "apo(a => map(coalg(a), Right))(t) === ana(coalg)(t)",
      check: (t) => EqT.eqv(apoUnfold(t), unfold(t)),
    },
  ];
}
