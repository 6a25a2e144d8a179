/**
 * Id (Identity)
 *
 * Id<A> = A
 *
 * The identity functor is both a monad and a comonad. It is erased at
 * runtime: there is no wrapper object, so plugging it into a generalized
 * scheme costs one extra function call per layer and nothing else.
 *
 * `gcata(idComonad, distCata)` is `cata` and `gana(idMonad, distAna)` is
 * `ana`.
 */

import type { IdF } from "../hkt.js";
import type { Comonad } from "../typeclasses/comonad.js";
import type { Monad } from "../typeclasses/monad.js";

// ============================================================================
// Id Type Definition
// ============================================================================

export type Id<A> = A;

// ============================================================================
// Instances
// ============================================================================

export const idMonad: Monad<IdF> = {
  map: (fa, f) => f(fa),
  ap: (fab, fa) => fab(fa),
  pure: (a) => a,
  flatMap: (fa, f) => f(fa),
};

export const idComonad: Comonad<IdF> = {
  map: (wa, f) => f(wa),
  extract: (wa) => wa,
  duplicate: (wa) => wa,
};
