/**
 * Conversions between recursive types
 *
 * Any Recursive type converts into any Corecursive type over the same
 * pattern functor by folding with `embed`. With a natural transformation in
 * the middle the pattern functor may change on the way (`hoist`), and with
 * an effect the rebuild can be sequenced (`transverse`, `cotransverse`).
 */

import type { $, TypeFunction } from "../hkt.js";
import type { ComposeF, Functor } from "../typeclasses/functor.js";
import type { NaturalTransformation } from "../typeclasses/natural.js";
import type { Corecursive, Recursive } from "./recursive.js";
import type { Fix } from "../fixpoint/fix.js";
import { fixBirecursive } from "../fixpoint/fix.js";
import { cata } from "./fold.js";
import { ana } from "./unfold.js";

/**
 * Rewrite every layer with `n`, bottom-up.
 */
export function hoist<S, F extends TypeFunction, T, G extends TypeFunction>(
  R: Recursive<S, F>,
  C: Corecursive<T, G>,
): (n: NaturalTransformation<F, G>) => (s: S) => T {
  return (n) => cata(R)<T>((layer: $<F, T>) => C.embed(n.transform<T>(layer)));
}

/**
 * Convert between two encodings of the same pattern functor.
 */
export function refix<S, T, F extends TypeFunction>(
  R: Recursive<S, F>,
  C: Corecursive<T, F>,
): (s: S) => T {
  return cata(R)<T>(C.embed);
}

export function toFix<T, F extends TypeFunction>(R: Recursive<T, F>): (t: T) => Fix<F> {
  return refix(R, fixBirecursive(R.functor));
}

export function fromFix<T, F extends TypeFunction>(C: Corecursive<T, F>): (fix: Fix<F>) => T {
  return refix(fixBirecursive(C.functor), C);
}

/**
 * `project` derived from `cata` and `embed`: rebuilds every child.
 */
export function lambek<T, F extends TypeFunction>(
  R: Recursive<T, F>,
  C: Corecursive<T, F>,
): (t: T) => $<F, T> {
  return cata(R)<$<F, T>>((layer: $<F, $<F, T>>) => R.functor.map(layer, C.embed));
}

/**
 * `embed` derived from `ana` and `project`.
 */
export function colambek<T, F extends TypeFunction>(
  R: Recursive<T, F>,
  C: Corecursive<T, F>,
): (layer: $<F, T>) => T {
  return ana(C)<$<F, T>>((layer: $<F, T>) => R.functor.map(layer, R.project));
}

/**
 * Effectful `hoist`. `n` decides the order in which the effects of a layer
 * are sequenced.
 */
export function transverse<S, F extends TypeFunction, T, H extends TypeFunction, G extends TypeFunction>(
  R: Recursive<S, F>,
  C: Corecursive<T, H>,
  G: Functor<G>,
): (n: NaturalTransformation<ComposeF<F, G>, ComposeF<G, H>>) => (s: S) => $<G, T> {
  return (n) =>
    cata(R)<$<G, T>>((layer: $<F, $<G, T>>) => G.map(n.transform<T>(layer), C.embed));
}

/**
 * Coeffectful `hoist`: unfold from a seed wrapped in G, threading G
 * through every layer.
 *
 * @example
 * ```typescript
 * // Capitalize every other character, carrying the flag as context
 * const alternate: NaturalTransformation<ComposeF<EnvF<boolean>, ListLayerF<string>>, ComposeF<ListLayerF<string>, EnvF<boolean>>> = {
 *   transform: ([upper, layer]) =>
 *     layer._tag === "Nil" ? Nil : Cons(upper ? layer.head.toUpperCase() : layer.head, [!upper, layer.tail] as const),
 * };
 * cotransverse(arrayBirecursive<string>(), arrayBirecursive<string>(), envComonad<boolean>())(alternate)([true, [..."foobar"]]);
 * // ["F", "o", "O", "b", "A", "r"]
 * ```
 */
export function cotransverse<S, F extends TypeFunction, T, H extends TypeFunction, G extends TypeFunction>(
  R: Recursive<S, F>,
  C: Corecursive<T, H>,
  G: Functor<G>,
): (n: NaturalTransformation<ComposeF<G, F>, ComposeF<H, G>>) => (gs: $<G, S>) => T {
  return (n) => ana(C)<$<G, S>>((gs: $<G, S>) => n.transform<S>(G.map(gs, R.project)));
}
