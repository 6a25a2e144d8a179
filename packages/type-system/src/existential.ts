/**
 * Existential Types
 *
 * TypeScript has no `exists` keyword. You can't express "I have a value of
 * some type S, and functions that work on S, but I've forgotten what S is."
 *
 * This module provides existential types via the CPS (Continuation-Passing
 * Style) encoding. The witness is described by a type-level function `W`,
 * so the hidden type can appear anywhere inside it:
 *
 * ```typescript
 * interface CounterF extends TypeFunction {
 *   readonly _: { readonly state: this["__kind__"]; readonly next: (s: this["__kind__"]) => this["__kind__"] };
 * }
 *
 * const counter = packExists<CounterF, number>({ state: 0, next: (n) => n + 1 });
 *
 * // The continuation must work for every S:
 * useExists(counter, (c) => c.next(c.next(c.state)) !== c.state); // true
 * ```
 *
 * To use an `Exists<W>` you supply a function that works for ALL possible
 * `S` (universal quantification), which is the dual of existential
 * quantification.
 */

import type { $, TypeFunction } from "./hkt.js";

// ============================================================================
// Type-Level API
// ============================================================================

/**
 * An existential type: "there exists some type S such that `$<W, S>` holds."
 */
export interface Exists<W extends TypeFunction> {
  /**
   * Eliminate the existential: provide a continuation that works for any S.
   */
  readonly use: <R>(k: <S>(witness: $<W, S>) => R) => R;
}

/**
 * Pack a witness into an existential, hiding the concrete type.
 *
 * @example
 * ```typescript
 * const packed = packExists<CounterF, number>({ state: 0, next: (n) => n + 1 });
 * // packed: Exists<CounterF>, the `number` is hidden
 * ```
 */
export function packExists<W extends TypeFunction, S>(witness: $<W, S>): Exists<W> {
  return {
    use: (k) => k<S>(witness),
  };
}

/**
 * Use (eliminate) an existential type.
 */
export function useExists<W extends TypeFunction, R>(
  ex: Exists<W>,
  k: <S>(witness: $<W, S>) => R,
): R {
  return ex.use(k);
}

/**
 * Map over the result of using an existential.
 */
export function mapExists<W extends TypeFunction, R, T>(
  ex: Exists<W>,
  k: <S>(witness: $<W, S>) => R,
  g: (r: R) => T,
): T {
  return g(ex.use(k));
}
