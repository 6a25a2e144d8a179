/**
 * Refolds
 *
 * An unfold immediately consumed by a fold. Refolds only need the pattern
 * functor, never a recursive type: the intermediate structure is never
 * built, each layer is produced by the coalgebra and consumed by the
 * algebra in the same call.
 *
 *   hylo(F)(alg, coalg) ≡ cata(R)(alg) ∘ ana(C)(coalg)   (on finite seeds)
 */

import type { $, CofreeTF, FreeTF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Comonad } from "../typeclasses/comonad.js";
import type { Monad } from "../typeclasses/monad.js";
import { flatten } from "../typeclasses/monad.js";
import type { DistributiveLaw } from "../typeclasses/natural.js";
import type { Algebra, Coalgebra, GAlgebra, GCoalgebra } from "./recursive.js";
import type { Either } from "../data/either.js";
import { isLeft } from "../data/either.js";
import type { Cofree } from "../data/cofree.js";
import { cofree, cofreeTComonad } from "../data/cofree.js";
import type { Free } from "../data/free.js";
import { Pure, freeTMonad } from "../data/free.js";
import { distGFutu, distGHisto } from "./distributive.js";
import type { CVAlgebra } from "./fold.js";
import type { CVCoalgebra } from "./unfold.js";

// ============================================================================
// hylo
// ============================================================================

/**
 * Hylomorphism.
 *
 * @example
 * ```typescript
 * // Fibonacci through a call tree that is never materialized
 * const split: Coalgebra<TreeLayerF<number>, number> = (n) =>
 *   n < 2 ? Leaf(n) : Branch(n - 1, n - 2);
 * const total: Algebra<TreeLayerF<number>, number> = (t) =>
 *   t._tag === "Leaf" ? t.value : t.left + t.right;
 * hylo(treeLayerFunctor<number>())(total, split)(10); // 55
 * ```
 */
export function hylo<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(algebra: Algebra<F, B>, coalgebra: Coalgebra<F, A>) => (seed: A) => B {
  return <A, B>(algebra: Algebra<F, B>, coalgebra: Coalgebra<F, A>) => {
    const go = (seed: A): B => algebra(F.map(coalgebra(seed), go));
    return go;
  };
}

// ============================================================================
// ghylo
// ============================================================================

/**
 * Generalized hylomorphism: a generalized fold over W fused with a
 * generalized unfold over M.
 */
export function ghylo<F extends TypeFunction>(
  F: Functor<F>,
): <W extends TypeFunction, M extends TypeFunction, A, B>(
  W: Comonad<W>,
  M: Monad<M>,
  w: DistributiveLaw<F, W>,
  m: DistributiveLaw<M, F>,
  algebra: GAlgebra<F, W, B>,
  coalgebra: GCoalgebra<F, M, A>,
) => (seed: A) => B {
  return <W extends TypeFunction, M extends TypeFunction, A, B>(
    W: Comonad<W>,
    M: Monad<M>,
    w: DistributiveLaw<F, W>,
    m: DistributiveLaw<M, F>,
    algebra: GAlgebra<F, W, B>,
    coalgebra: GCoalgebra<F, M, A>,
  ) => {
    const join = flatten(M);
    const h = (ma: $<M, A>): $<W, B> =>
      W.map(
        w.distribute<$<W, B>>(
          F.map(m.distribute<$<M, A>>(M.map(ma, coalgebra)), (mma: $<M, $<M, A>>) =>
            W.duplicate(h(join(mma))),
          ),
        ),
        algebra,
      );
    return (seed: A): B => W.extract(h(M.pure(seed)));
  };
}

// ============================================================================
// chrono / gchrono
// ============================================================================

/**
 * Chronomorphism: a futumorphism fused with a histomorphism. The coalgebra
 * may look ahead, the algebra may look back.
 */
export function chrono<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(algebra: CVAlgebra<F, B>, coalgebra: CVCoalgebra<F, A>) => (seed: A) => B {
  return <A, B>(algebra: CVAlgebra<F, B>, coalgebra: CVCoalgebra<F, A>) => {
    // Seeds are pending Free steps: a Wrap is emitted as is, a Pure seed is
    // expanded by the coalgebra. Each layer is annotated once on the way up.
    const expand = (step: Free<F, A>): $<F, Free<F, A>> =>
      step._tag === "Pure" ? coalgebra(step.value) : step.layer;
    const annotate = (layer: $<F, Cofree<F, B>>): Cofree<F, B> => cofree<F, B>(algebra(layer), layer);
    const run = hylo(F)<Free<F, A>, Cofree<F, B>>(annotate, expand);
    return (seed: A): B => run(Pure(seed)).head;
  };
}

export function gchrono<F extends TypeFunction>(
  F: Functor<F>,
): <W extends TypeFunction, M extends TypeFunction, A, B>(
  W: Comonad<W>,
  M: Monad<M>,
  w: DistributiveLaw<F, W>,
  m: DistributiveLaw<M, F>,
  algebra: GAlgebra<F, CofreeTF<F, W>, B>,
  coalgebra: GCoalgebra<F, FreeTF<F, M>, A>,
) => (seed: A) => B {
  return <W extends TypeFunction, M extends TypeFunction, A, B>(
    W: Comonad<W>,
    M: Monad<M>,
    w: DistributiveLaw<F, W>,
    m: DistributiveLaw<M, F>,
    algebra: GAlgebra<F, CofreeTF<F, W>, B>,
    coalgebra: GCoalgebra<F, FreeTF<F, M>, A>,
  ) =>
    ghylo(F)<CofreeTF<F, W>, FreeTF<F, M>, A, B>(
      cofreeTComonad(F, W),
      freeTMonad(F, M),
      distGHisto(F, W, w),
      distGFutu(F, M, m),
      algebra,
      coalgebra,
    );
}

// ============================================================================
// Elgot
// ============================================================================

/**
 * Elgot algebra: a hylomorphism whose coalgebra may finish early. A `Left`
 * from the coalgebra is the result for that seed; the algebra never sees it.
 */
export function elgot<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(algebra: Algebra<F, A>, coalgebra: (seed: B) => Either<A, $<F, B>>) => (seed: B) => A {
  return <A, B>(algebra: Algebra<F, A>, coalgebra: (seed: B) => Either<A, $<F, B>>) => {
    const go = (seed: B): A => {
      const step = coalgebra(seed);
      return isLeft(step) ? step.left : algebra(F.map(step.right, go));
    };
    return go;
  };
}

/**
 * Elgot coalgebra: a hylomorphism whose algebra also sees the seed that
 * produced each layer.
 */
export function coelgot<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(algebra: (pair: readonly [A, $<F, B>]) => B, coalgebra: Coalgebra<F, A>) => (seed: A) => B {
  return <A, B>(algebra: (pair: readonly [A, $<F, B>]) => B, coalgebra: Coalgebra<F, A>) => {
    const go = (seed: A): B => algebra([seed, F.map(coalgebra(seed), go)]);
    return go;
  };
}
