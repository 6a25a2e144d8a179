/**
 * Functor, Comonad and Monad Laws
 *
 * Functor:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * Comonad:
 *   - extract(duplicate(wa)) === wa
 *   - map(duplicate(wa), extract) === wa
 *   - extend(wa, extract) === wa
 *
 * Monad (stated over a generated `ma`):
 *   - Left identity: flatMap(ma, a => flatMap(pure(a), f)) === flatMap(ma, f)
 *   - Right identity: flatMap(ma, pure) === ma
 *   - Associativity: flatMap(flatMap(ma, f), g) === flatMap(ma, a => flatMap(f(a), g))
 *
 * @module
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Comonad } from "../typeclasses/comonad.js";
import { extend } from "../typeclasses/comonad.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

/**
 * Laws for a Functor, with the composed functions fixed.
 *
 * @example
 * ```typescript
 * const laws = functorLaws(treeLayerFunctor<string>(), eqLayer, (n) => n + 1, (n) => n * 2);
 * ```
 */
export function functorLaws<F extends TypeFunction, A>(
  F: Functor<F>,
  EqFA: Eq<$<F, A>>,
  f: (a: A) => A,
  g: (a: A) => A,
): LawSet<$<F, A>> {
  return [
    {
      name: "identity",
      arity: 1,
      proofHint: "identity-left",
      description: "F.map(fa, a => a) === fa",
      check: (fa) => EqFA.eqv(F.map(fa, (a: A) => a), fa),
    },
    {
      name: "composition",
      arity: 1,
      proofHint: "composition",
      description: "F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa) =>
        EqFA.eqv(
          F.map(F.map(fa, f), g),
          F.map(fa, (a: A) => g(f(a))),
        ),
    },
  ];
}

export function comonadLaws<W extends TypeFunction, A>(W: Comonad<W>, EqWA: Eq<$<W, A>>): LawSet<$<W, A>> {
  const extendW = extend(W);
  return [
    {
      name: "extract after duplicate",
      arity: 1,
      proofHint: "identity-left",
      description: "W.extract(W.duplicate(wa)) === wa",
      check: (wa) => EqWA.eqv(W.extract<$<W, A>>(W.duplicate<A>(wa)), wa),
    },
    {
      name: "map extract after duplicate",
      arity: 1,
      proofHint: "identity-right",
      description: "W.map(W.duplicate(wa), W.extract) === wa",
      check: (wa) =>
        EqWA.eqv(
          W.map<$<W, A>, A>(W.duplicate<A>(wa), (inner: $<W, A>) => W.extract<A>(inner)),
          wa,
        ),
    },
    {
      name: "extend extract",
      arity: 1,
      proofHint: "identity-right",
      description: "extend(wa, W.extract) === wa",
      check: (wa) => EqWA.eqv(extendW<A, A>(wa, (inner) => W.extract<A>(inner)), wa),
    },
  ];
}

export function monadLaws<M extends TypeFunction, A>(
  M: Monad<M>,
  EqMA: Eq<$<M, A>>,
  f: (a: A) => $<M, A>,
  g: (a: A) => $<M, A>,
): LawSet<$<M, A>> {
  return [
    {
      name: "left identity",
      arity: 1,
      proofHint: "identity-left",
      description: "M.flatMap(M.pure(a), f) === f(a)",
      check: (ma) =>
        EqMA.eqv(
          M.flatMap(ma, (a: A) => M.flatMap(M.pure(a), f)),
          M.flatMap(ma, f),
        ),
    },
    {
      name: "right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "M.flatMap(ma, M.pure) === ma",
      check: (ma) => EqMA.eqv(M.flatMap(ma, (a: A) => M.pure(a)), ma),
    },
    {
      name: "associativity",
      arity: 1,
      proofHint: "associativity",
      description: "M.flatMap(M.flatMap(ma, f), g) === M.flatMap(ma, a => M.flatMap(f(a), g))",
      check: (ma) =>
        EqMA.eqv(
          M.flatMap(M.flatMap(ma, f), g),
          M.flatMap(ma, (a: A) => M.flatMap(f(a), g)),
        ),
    },
  ];
}
