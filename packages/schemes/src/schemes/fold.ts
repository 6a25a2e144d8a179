/**
 * Folds
 *
 * Every fold consumes a value of a Recursive type one layer at a time,
 * bottom-up. They differ in what the algebra sees at each recursive
 * position:
 *
 * | scheme   | recursive position holds                              |
 * |----------|-------------------------------------------------------|
 * | cata     | the result for that subterm                           |
 * | para     | the original subterm and its result                   |
 * | zygo     | an auxiliary fold's result and the result             |
 * | histo    | the results for the subterm and everything below it   |
 * | gcata    | the result inside any comonad, via a distributive law |
 *
 * The named schemes are `gcata` with a canonical distributive law; the
 * generic ones stay available for other comonads.
 *
 * @example
 * ```typescript
 * const sum: Algebra<ListLayerF<number>, number> = (layer) =>
 *   layer._tag === "Nil" ? 0 : layer.head + layer.tail;
 * cata(listBirecursive<number>())(sum)(fromArray([1, 2, 3])); // 6
 * ```
 */

import type { $, CofreeF, CofreeTF, EnvF, EnvTF, TypeFunction } from "../hkt.js";
import type { Comonad } from "../typeclasses/comonad.js";
import type { DistributiveLaw, NaturalTransformation } from "../typeclasses/natural.js";
import type { Algebra, Birecursive, GAlgebra, Recursive } from "./recursive.js";
import type { Env } from "../data/env.js";
import { envComonad, envTComonad } from "../data/env.js";
import type { Cofree } from "../data/cofree.js";
import { cofree, cofreeComonad, cofreeTComonad } from "../data/cofree.js";
import { distGHisto, distHisto, distZygo, distZygoT } from "./distributive.js";

/**
 * Algebra of a paramorphism: each position holds `[subterm, result]`.
 */
export type RAlgebra<F extends TypeFunction, T, A> = (layer: $<F, readonly [T, A]>) => A;

/**
 * Algebra of a histomorphism: each position holds the annotated history.
 */
export type CVAlgebra<F extends TypeFunction, A> = (layer: $<F, Cofree<F, A>>) => A;

// ============================================================================
// cata
// ============================================================================

/**
 * Catamorphism: collapse a structure bottom-up.
 *
 * Uses the capability's own `cata` when it has one. Otherwise the fold
 * recurses once per layer, so a structure nested a few thousand layers
 * deep exceeds the call stack; `listBirecursive` and `arrayBirecursive`
 * supply loops for long sequences.
 */
export function cata<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(algebra: Algebra<F, A>) => (t: T) => A {
  return <A>(algebra: Algebra<F, A>) => {
    const specialized = R.cata;
    if (specialized !== undefined) {
      return (t: T): A => specialized(algebra, t);
    }
    const go = (t: T): A => algebra(R.functor.map(R.project(t), go));
    return go;
  };
}

/**
 * Effectful fold: `cata` whose carrier is `G<A>`. The algebra decides how
 * effects from the recursive positions are combined.
 */
export function cataA<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <G extends TypeFunction, A>(algebra: Algebra<F, $<G, A>>) => (t: T) => $<G, A> {
  return <G extends TypeFunction, A>(algebra: Algebra<F, $<G, A>>) => cata(R)(algebra);
}

// ============================================================================
// gcata
// ============================================================================

/**
 * Generalized catamorphism over the comonad W.
 *
 * At each layer the results for the children are wrapped in W, pushed
 * through the pattern functor by `k`, and the algebra reads them back.
 */
export function gcata<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <W extends TypeFunction, A>(
  W: Comonad<W>,
  k: DistributiveLaw<F, W>,
  algebra: GAlgebra<F, W, A>,
) => (t: T) => A {
  return <W extends TypeFunction, A>(
    W: Comonad<W>,
    k: DistributiveLaw<F, W>,
    algebra: GAlgebra<F, W, A>,
  ) => {
    const c = (t: T): $<W, $<F, $<W, A>>> =>
      k.distribute<$<W, A>>(
        R.functor.map(R.project(t), (child: T) => W.duplicate(W.map(c(child), algebra))),
      );
    return (t: T): A => algebra(W.extract(c(t)));
  };
}

// ============================================================================
// para / gpara
// ============================================================================

/**
 * Paramorphism: the algebra also sees the original subterm at each
 * recursive position.
 */
export function para<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(algebra: RAlgebra<F, T, A>) => (t: T) => A {
  return <A>(algebra: RAlgebra<F, T, A>) => {
    const go = (t: T): A =>
      algebra(R.functor.map(R.project(t), (child: T) => [child, go(child)] as const));
    return go;
  };
}

export function gpara<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <W extends TypeFunction, A>(
  W: Comonad<W>,
  k: DistributiveLaw<F, W>,
  algebra: GAlgebra<F, EnvTF<T, W>, A>,
) => (t: T) => A {
  return (W, k, algebra) => gzygo(B)(B.embed, W, k, algebra);
}

// ============================================================================
// zygo / gzygo
// ============================================================================

/**
 * Zygomorphism: fold with a helper. Each position holds `[aux, result]`
 * where `aux` is the helper algebra's fold of the same subterm.
 *
 * @example
 * ```typescript
 * // Alternating sum from the right: the helper counts the remaining length.
 * const length: Algebra<ListLayerF<number>, number> = (l) => (l._tag === "Nil" ? 0 : l.tail + 1);
 * zygo(R)(length, (l) => (l._tag === "Nil" ? 0 : l.tail[0] % 2 === 0 ? l.head + l.tail[1] : l.tail[1] - l.head));
 * ```
 */
export function zygo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <B, A>(aux: Algebra<F, B>, algebra: (layer: $<F, Env<B, A>>) => A) => (t: T) => A {
  return <B, A>(aux: Algebra<F, B>, algebra: (layer: $<F, Env<B, A>>) => A) =>
    gcata(R)<EnvF<B>, A>(envComonad<B>(), distZygo(R.functor, aux), algebra);
}

export function gzygo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <B, W extends TypeFunction, A>(
  aux: Algebra<F, B>,
  W: Comonad<W>,
  k: DistributiveLaw<F, W>,
  algebra: GAlgebra<F, EnvTF<B, W>, A>,
) => (t: T) => A {
  return <B, W extends TypeFunction, A>(
    aux: Algebra<F, B>,
    W: Comonad<W>,
    k: DistributiveLaw<F, W>,
    algebra: GAlgebra<F, EnvTF<B, W>, A>,
  ) => gcata(R)<EnvTF<B, W>, A>(envTComonad<B, W>(W), distZygoT(R.functor, aux, k), algebra);
}

// ============================================================================
// histo / ghisto
// ============================================================================

/**
 * Histomorphism: each position holds the result for that subterm (`head`)
 * together with the annotated results for everything below it (`tail`).
 *
 * @example
 * ```typescript
 * // Fibonacci over Peano naturals: reads the two previous results
 * const fib: CVAlgebra<NatLayerF, number> = (layer) => {
 *   if (layer._tag === "Zero") return 0;
 *   const prev = layer.pred;
 *   return prev.tail._tag === "Zero" ? 1 : prev.head + prev.tail.pred.head;
 * };
 * histo(natBirecursive)(fib)(10); // 55
 * ```
 */
export function histo<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <A>(algebra: CVAlgebra<F, A>) => (t: T) => A {
  return <A>(algebra: CVAlgebra<F, A>) => {
    // Annotates bottom-up: one algebra call per node, each history shared.
    const annotate = cata(R)<Cofree<F, A>>((layer) => cofree<F, A>(algebra(layer), layer));
    return (t: T): A => annotate(t).head;
  };
}

export function ghisto<T, F extends TypeFunction>(
  R: Recursive<T, F>,
): <H extends TypeFunction, A>(
  H: Comonad<H>,
  k: DistributiveLaw<F, H>,
  algebra: GAlgebra<F, CofreeTF<F, H>, A>,
) => (t: T) => A {
  return <H extends TypeFunction, A>(
    H: Comonad<H>,
    k: DistributiveLaw<F, H>,
    algebra: GAlgebra<F, CofreeTF<F, H>, A>,
  ) => gcata(R)<CofreeTF<F, H>, A>(cofreeTComonad(R.functor, H), distGHisto(R.functor, H, k), algebra);
}

// ============================================================================
// prepro / gprepro
// ============================================================================

/**
 * Prepromorphism: before a subterm is folded, `e` is applied to every
 * layer of it, all the way down. Applying it again at every depth means a
 * subterm n levels deep has been rewritten n times.
 *
 * @example
 * ```typescript
 * // Stop at the first element >= 10
 * const filterLT10: NaturalTransformation<ListLayerF<number>, ListLayerF<number>> = {
 *   transform: (layer) => (layer._tag === "Cons" && layer.head >= 10 ? Nil : layer),
 * };
 * prepro(arrayBirecursive<number>())(filterLT10, sum)([1, 2, 10, 3]); // 3
 * ```
 */
export function prepro<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <A>(e: NaturalTransformation<F, F>, algebra: Algebra<F, A>) => (t: T) => A {
  return <A>(e: NaturalTransformation<F, F>, algebra: Algebra<F, A>) => {
    const rewrite = cata(B)<T>((layer: $<F, T>) => B.embed(e.transform<T>(layer)));
    const c = (t: T): A => algebra(B.functor.map(B.project(t), (child: T) => c(rewrite(child))));
    return c;
  };
}

export function gprepro<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <W extends TypeFunction, A>(
  W: Comonad<W>,
  k: DistributiveLaw<F, W>,
  e: NaturalTransformation<F, F>,
  algebra: GAlgebra<F, W, A>,
) => (t: T) => A {
  return <W extends TypeFunction, A>(
    W: Comonad<W>,
    k: DistributiveLaw<F, W>,
    e: NaturalTransformation<F, F>,
    algebra: GAlgebra<F, W, A>,
  ) => {
    const rewrite = cata(B)<T>((layer: $<F, T>) => B.embed(e.transform<T>(layer)));
    const c = (t: T): $<W, A> =>
      W.map(
        k.distribute<$<W, A>>(
          B.functor.map(B.project(t), (child: T) => W.duplicate(c(rewrite(child)))),
        ),
        algebra,
      );
    return (t: T): A => W.extract(c(t));
  };
}

/**
 * `gprepro` with a zygomorphic helper over a histomorphic fold.
 */
export function zygoHistoPrepro<T, F extends TypeFunction>(
  B: Birecursive<T, F>,
): <Aux, A>(
  aux: Algebra<F, Aux>,
  e: NaturalTransformation<F, F>,
  algebra: GAlgebra<F, EnvTF<Aux, CofreeF<F>>, A>,
) => (t: T) => A {
  return <Aux, A>(
    aux: Algebra<F, Aux>,
    e: NaturalTransformation<F, F>,
    algebra: GAlgebra<F, EnvTF<Aux, CofreeF<F>>, A>,
  ) =>
    gprepro(B)<EnvTF<Aux, CofreeF<F>>, A>(
      envTComonad<Aux, CofreeF<F>>(cofreeComonad(B.functor)),
      distZygoT(B.functor, aux, distHisto(B.functor)),
      e,
      algebra,
    );
}
