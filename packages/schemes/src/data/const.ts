/**
 * Non-recursive types as (trivially) recursive ones.
 *
 * A type with no recursive positions has the constant functor as its
 * pattern representation: mapping does nothing, projecting and embedding
 * are identities. Every scheme then degenerates to applying the algebra or
 * coalgebra exactly once.
 *
 * @example
 * ```typescript
 * const B = constBirecursive<string>();
 * cata(B)((s: string) => s.length)("abc"); // 3
 * ```
 */

import type { ConstF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Birecursive } from "../schemes/recursive.js";

export function constFunctor<C>(): Functor<ConstF<C>> {
  return { map: (fa) => fa };
}

export function constBirecursive<T>(): Birecursive<T, ConstF<T>> {
  return {
    functor: constFunctor<T>(),
    project: (t) => t,
    embed: (t) => t,
  };
}
