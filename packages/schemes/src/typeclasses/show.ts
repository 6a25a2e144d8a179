/**
 * Show Typeclass
 *
 * A type class for converting values to their string representation.
 * Unlike toString(), Show is intended to produce a "programmer-friendly"
 * representation, often valid code that could recreate the value.
 *
 * ShowK lifts a Show one level through a type constructor, so a layer can be
 * printed given a printer for its recursive positions.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Show
// ============================================================================

/**
 * Show typeclass
 */
export interface Show<A> {
  readonly show: (a: A) => string;
}

/**
 * Show of `F<A>` given Show of `A`.
 */
export interface ShowK<F extends TypeFunction> {
  readonly liftShow: <A>(S: Show<A>) => Show<$<F, A>>;
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

// ============================================================================
// Combinators
// ============================================================================

/**
 * Show for arrays
 */
export function showArray<A>(S: Show<A>): Show<readonly A[]> {
  return {
    show: (arr) => `[${arr.map((a) => S.show(a)).join(", ")}]`,
  };
}

/**
 * Show for pairs
 */
export function showTuple<A, B>(SA: Show<A>, SB: Show<B>): Show<readonly [A, B]> {
  return {
    show: ([a, b]) => `(${SA.show(a)}, ${SB.show(b)})`,
  };
}

/**
 * Show by mapping to a different type
 */
export function contramap<A, B>(S: Show<B>, f: (a: A) => B): Show<A> {
  return {
    show: (a) => S.show(f(a)),
  };
}

/**
 * Show using a custom function
 */
export function makeShow<A>(show: (a: A) => string): Show<A> {
  return { show };
}
