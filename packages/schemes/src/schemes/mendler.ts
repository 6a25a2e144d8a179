/**
 * Mendler-style folds over `Fix`
 *
 * A Mendler algebra receives the raw layer together with the recursive
 * call, and must work for *any* type `Y` of children. Because it cannot
 * inspect a `Y` except through `recurse` (or `out`), termination does not
 * depend on a Functor instance, and none is required.
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Fix } from "../fixpoint/fix.js";
import { unfix } from "../fixpoint/fix.js";

export type MendlerAlgebra<F extends TypeFunction, C> = <Y>(recurse: (y: Y) => C, layer: $<F, Y>) => C;

/**
 * Mendler algebra with access to the layer under each child (`out`).
 */
export type MendlerCVAlgebra<F extends TypeFunction, C> = <Y>(
  recurse: (y: Y) => C,
  out: (y: Y) => $<F, Y>,
  layer: $<F, Y>,
) => C;

/**
 * Mendler-style iteration.
 *
 * @example
 * ```typescript
 * const length: MendlerAlgebra<ListLayerF<string>, number> = (recurse, layer) =>
 *   layer._tag === "Nil" ? 0 : 1 + recurse(layer.tail);
 * mcata(length)(toFix(listBirecursive<string>())(of("a", "b"))); // 2
 * ```
 */
export function mcata<F extends TypeFunction, C>(psi: MendlerAlgebra<F, C>): (fix: Fix<F>) => C {
  const go = (fix: Fix<F>): C => psi<Fix<F>>(go, fix.unfix);
  return go;
}

/**
 * Mendler-style course-of-value iteration.
 */
export function mhisto<F extends TypeFunction, C>(psi: MendlerCVAlgebra<F, C>): (fix: Fix<F>) => C {
  const go = (fix: Fix<F>): C => psi<Fix<F>>(go, unfix, fix.unfix);
  return go;
}
