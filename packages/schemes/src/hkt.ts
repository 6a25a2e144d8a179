/**
 * Higher-Kinded Types for @refold/schemes
 *
 * This module declares the type-level functions for every data type of the
 * package, using the encoding from `@refold/type-system`.
 *
 * The data types themselves live in their own modules; this file only
 * imports them, so `Kind<ListLayerF<A>, X>` resolves to `ListLayer<A, X>`.
 *
 * ## Multi-arity type constructors
 *
 * For types with several parameters, all but the rightmost are fixed and the
 * rightmost varies. For pattern layers the rightmost parameter is always
 * the recursive position:
 *
 * ```typescript
 * interface ListLayerF<A> extends TypeFunction { _: ListLayer<A, this["__kind__"]> }
 * // Kind<ListLayerF<string>, number> → ListLayer<string, number>
 * ```
 *
 * Transformers take the type function of the structure they wrap:
 *
 * ```typescript
 * // Kind<CofreeTF<ListLayerF<string>, IdF>, number> → CofreeT<ListLayerF<string>, IdF, number>
 * ```
 */

// Re-export core HKT infrastructure from type-system
export type { $, Kind, TypeFunction } from "@refold/type-system";

import type { TypeFunction } from "@refold/type-system";

import type { Id } from "./data/id.js";
import type { Env, EnvT } from "./data/env.js";
import type { Either } from "./data/either.js";
import type { ExceptT } from "./data/except.js";
import type { Cofree, CofreeLayer, CofreeT } from "./data/cofree.js";
import type { Free, FreeLayer, FreeT } from "./data/free.js";
import type { ListLayer } from "./data/list.js";
import type { NonEmptyLayer } from "./data/non-empty.js";
import type { NatLayer } from "./data/nat.js";
import type { TreeLayer } from "./data/tree.js";
import type { StreamLayer } from "./data/stream.js";

// ============================================================================
// Auxiliary structures
// ============================================================================

/**
 * Type-level function for `Id<A>` (= `A`).
 */
export interface IdF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Id<this["__kind__"]>;
}

/**
 * Type-level function for `Env<E, A>` with E fixed.
 */
export interface EnvF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Env<E, this["__kind__"]>;
}

/**
 * Type-level function for `EnvT<E, W, A>` with E and W fixed.
 */
export interface EnvTF<E, W extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: EnvT<E, W, this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 *
 * @example
 * ```typescript
 * type StringResult<A> = Kind<EitherF<string>, A>; // → Either<string, A>
 * ```
 */
export interface EitherF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Either<E, this["__kind__"]>;
}

export interface ExceptTF<E, M extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: ExceptT<E, M, this["__kind__"]>;
}

/**
 * Type-level function for `Cofree<F, A>`: varies the annotation.
 */
export interface CofreeF<F extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Cofree<F, this["__kind__"]>;
}

/**
 * Type-level function for `CofreeLayer<F, A, X>`: varies the recursive position.
 */
export interface CofreeLayerF<F extends TypeFunction, A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: CofreeLayer<F, A, this["__kind__"]>;
}

export interface CofreeTF<F extends TypeFunction, W extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: CofreeT<F, W, this["__kind__"]>;
}

/**
 * Type-level function for `Free<F, A>`: varies the leaf value.
 */
export interface FreeF<F extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Free<F, this["__kind__"]>;
}

/**
 * Type-level function for `FreeLayer<F, A, X>`: varies the recursive position.
 */
export interface FreeLayerF<F extends TypeFunction, A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: FreeLayer<F, A, this["__kind__"]>;
}

export interface FreeTF<F extends TypeFunction, M extends TypeFunction> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: FreeT<F, M, this["__kind__"]>;
}

/**
 * Constant type function: ignores its argument. The pattern
 * representation of a non-recursive type.
 */
export interface ConstF<C> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: C;
}

// ============================================================================
// Pattern layers of the bundled recursive types
// ============================================================================

export interface ListLayerF<A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: ListLayer<A, this["__kind__"]>;
}

export interface NonEmptyLayerF<A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: NonEmptyLayer<A, this["__kind__"]>;
}

export interface NatLayerF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: NatLayer<this["__kind__"]>;
}

export interface TreeLayerF<A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: TreeLayer<A, this["__kind__"]>;
}

export interface StreamLayerF<A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: StreamLayer<A, this["__kind__"]>;
}
