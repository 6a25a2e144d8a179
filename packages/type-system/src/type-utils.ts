/**
 * Type-Level Boolean Utilities
 *
 * Used to state facts about types as compile-time assertions:
 *
 * ```typescript
 * type _ = Expect<Equal<Kind<ListLayerF<number>, string>, ListLayer<number, string>>>;
 * ```
 */

/**
 * Exact type equality (no assignability shortcuts, `any` is only equal to `any`).
 */
export type Equal<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2 ? true : false;

/**
 * Check if A is assignable to B.
 */
export type Extends<A, B> = A extends B ? true : false;

/**
 * Compile-time assertion: only `true` is accepted.
 */
export type Expect<T extends true> = T;

/**
 * Check if T is `never`.
 */
export type IsNever<T> = [T] extends [never] ? true : false;
