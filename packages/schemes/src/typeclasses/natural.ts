/**
 * Natural transformations and distributive laws.
 *
 * Both are rank-2: the transformation must work for *every* element type,
 * so each is modelled as a single-method interface whose method carries its
 * own type parameter. A plain function type would fix `A` at the call site
 * of the scheme instead.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// NaturalTransformation
// ============================================================================

/**
 * A polymorphic function `F ~> G` that changes the outer structure and
 * leaves the contents alone.
 *
 * @example
 * ```typescript
 * const dropEvens: NaturalTransformation<ListLayerF<number>, ListLayerF<number>> = {
 *   transform: (layer) => (layer._tag === "Cons" && layer.head % 2 === 0 ? Nil : layer),
 * };
 * ```
 */
export interface NaturalTransformation<F extends TypeFunction, G extends TypeFunction> {
  transform<A>(fa: $<F, A>): $<G, A>;
}

export function identityTransformation<F extends TypeFunction>(): NaturalTransformation<F, F> {
  return { transform: (fa) => fa };
}

/**
 * `g ∘ f`: run `f` first.
 */
export function composeTransformations<
  F extends TypeFunction,
  G extends TypeFunction,
  H extends TypeFunction,
>(f: NaturalTransformation<F, G>, g: NaturalTransformation<G, H>): NaturalTransformation<F, H> {
  return {
    transform: <A>(fa: $<F, A>): $<H, A> => g.transform<A>(f.transform<A>(fa)),
  };
}

// ============================================================================
// DistributiveLaw
// ============================================================================

/**
 * Swap two layers of structure: `F<G<A>> -> G<F<A>>`.
 *
 * Generalized folds take a `DistributiveLaw<F, W>` (pattern over comonad);
 * generalized unfolds take a `DistributiveLaw<M, F>` (monad over pattern).
 * Instances must be natural in `A` and respect the laws of the comonad or
 * monad they distribute; nothing checks this at runtime.
 */
export interface DistributiveLaw<F extends TypeFunction, G extends TypeFunction> {
  distribute<A>(fga: $<F, $<G, A>>): $<G, $<F, A>>;
}
