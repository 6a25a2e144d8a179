/**
 * Higher-Kinded Types via Type-Level Functions
 *
 * TypeScript cannot abstract over a type constructor directly: there is no
 * way to write `interface Functor<F<_>>`. This module encodes type
 * constructors as *type-level functions*: interfaces whose `_` member is
 * computed from a phantom `__kind__` argument through `this`.
 *
 * ## How it works
 *
 * ```typescript
 * interface ListF extends TypeFunction {
 *   readonly __kind__: unknown;
 *   readonly _: List<this["__kind__"]>;
 * }
 *
 * type Kind<F, A> = (F & { readonly __kind__: A })["_"];
 * ```
 *
 * Intersecting `F` with `{ __kind__: A }` narrows the phantom argument, and
 * reading `_` through the intersection substitutes it for `this["__kind__"]`:
 *
 * - `Kind<ListF, number>` → `List<number>` (known type function, resolved eagerly)
 * - `Kind<F, A>` → stays deferred while `F` is a type parameter
 *
 * Generic code is therefore written once against `$<F, A>` and every call
 * site sees the concrete type.
 *
 * ## Multi-arity type constructors
 *
 * Fix all but one parameter and vary the rightmost:
 *
 * ```typescript
 * interface EitherF<E> extends TypeFunction {
 *   readonly _: Either<E, this["__kind__"]>;
 * }
 * // Kind<EitherF<string>, number> → Either<string, number>
 * ```
 */

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 *
 * All type-level functions (like `ListLayerF<A>`, `CofreeF<F>`) extend this
 * interface and override `_` with a type mentioning `this["__kind__"]`.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type-level function `F` to `A`.
 *
 * @example
 * ```typescript
 * interface BoxF extends TypeFunction {
 *   readonly _: { readonly value: this["__kind__"] };
 * }
 * const box: Kind<BoxF, number> = { value: 1 };
 * function id<F extends TypeFunction>(fa: Kind<F, number>): Kind<F, number> {
 *   return fa;
 * }
 * ```
 */
export type Kind<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Shorthand for `Kind<F, A>`.
 */
export type $<F extends TypeFunction, A> = Kind<F, A>;
