/**
 * Typeclasses
 *
 * Each typeclass module is exported as a namespace to avoid name collisions,
 * with the interfaces also exported directly for convenience.
 */

// Functor hierarchy
export * as FunctorOps from "./functor.js";
export type { Functor, ComposeF } from "./functor.js";

export * as ApplicativeOps from "./applicative.js";
export type { Apply, Applicative } from "./applicative.js";

export * as MonadOps from "./monad.js";
export type { FlatMap, Monad } from "./monad.js";

export * as ComonadOps from "./comonad.js";
export type { Comonad } from "./comonad.js";

// Comparison and printing
export * as EqOps from "./eq.js";
export type { Eq, Ord, Ordering, EqK, OrdK } from "./eq.js";

export * as ShowOps from "./show.js";
export type { Show, ShowK } from "./show.js";

// Rank-2 transformations
export { identityTransformation, composeTransformations } from "./natural.js";
export type { NaturalTransformation, DistributiveLaw } from "./natural.js";
