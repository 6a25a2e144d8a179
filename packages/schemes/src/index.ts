/**
 * @refold/schemes: recursion schemes for TypeScript
 *
 * Generic folds, unfolds and refolds over any recursive type that can show
 * one layer of itself.
 *
 * Features:
 * - The combinator catalogue: cata, ana, hylo, para, zygo, histo, apo,
 *   futu, chrono, elgot and their generalized forms
 * - Distributive laws behind every generalized scheme
 * - Three fixed points for any pattern functor (Fix, Mu, Nu)
 * - Pattern layers for lists, arrays, naturals, trees and streams
 * - Laws as data, with a runtime checker
 *
 * @example
 * ```typescript
 * import { cata, hylo, arrayBirecursive, treeLayerFunctor, Leaf, Branch } from "@refold/schemes";
 *
 * // Length of an array
 * cata(arrayBirecursive<number>())((l) => (l._tag === "Nil" ? 0 : l.tail + 1))([1, 2, 3]); // 3
 *
 * // Fibonacci through a call tree that is never built
 * hylo(treeLayerFunctor<number>())(
 *   (l) => (l._tag === "Leaf" ? l.value : l.left + l.right),
 *   (n: number) => (n < 2 ? Leaf(n) : Branch(n - 1, n - 2)),
 * )(10); // 55
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type {
  $,
  Kind,
  TypeFunction,
  IdF,
  EnvF,
  EnvTF,
  EitherF,
  ExceptTF,
  CofreeF,
  CofreeLayerF,
  CofreeTF,
  FreeF,
  FreeLayerF,
  FreeTF,
  ConstF,
  ListLayerF,
  NonEmptyLayerF,
  NatLayerF,
  TreeLayerF,
  StreamLayerF,
} from "./hkt.js";

// ============================================================================
// Typeclasses - namespace export to avoid collisions
// ============================================================================

export * as TC from "./typeclasses/index.js";
// Also export commonly used typeclass interfaces directly
export type {
  Functor,
  ComposeF,
  Applicative,
  Monad,
  Comonad,
  Eq,
  Ord,
  EqK,
  OrdK,
  Show,
  ShowK,
  NaturalTransformation,
  DistributiveLaw,
} from "./typeclasses/index.js";
export { eqNumber, eqString, eqBoolean, ordNumber, ordString } from "./typeclasses/eq.js";
export { showNumber, showString, showBoolean } from "./typeclasses/show.js";

// ============================================================================
// Schemes, fixed points, data types
// ============================================================================

export * from "./schemes/index.js";
export * from "./fixpoint/index.js";
export * from "./data/index.js";

// ============================================================================
// Laws, configuration, errors
// ============================================================================

export * as Laws from "./laws/index.js";
export { config } from "./config.js";
export type { RefoldConfig, ConfigPath, ConfigValues } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { RefoldError, PreconditionError, LawViolationError, ConfigError } from "./errors.js";
