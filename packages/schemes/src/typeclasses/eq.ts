/**
 * Eq and Ord Typeclasses
 *
 * Eq: Equality comparison
 * Ord: Total ordering
 *
 * EqK and OrdK lift a comparison one level through a type constructor: given
 * how to compare the values at the recursive positions, they compare a whole
 * layer. Fixed points tie the knot through these lifts.
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Ord Antisymmetry: compare(x, y) <= 0 && compare(y, x) <= 0 => eqv(x, y)
 *   - Ord Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Ordering
// ============================================================================

/**
 * Result of a comparison
 */
export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Eq / Ord
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => Ordering;
}

// ============================================================================
// Lifted (one level)
// ============================================================================

/**
 * Equality of `F<A>` given equality of `A`.
 */
export interface EqK<F extends TypeFunction> {
  readonly liftEq: <A>(E: Eq<A>) => Eq<$<F, A>>;
}

/**
 * Ordering of `F<A>` given ordering of `A`.
 *
 * Layers of different variants compare by declaration order of the variants.
 */
export interface OrdK<F extends TypeFunction> extends EqK<F> {
  readonly liftCompare: <A>(O: Ord<A>) => Ord<$<F, A>>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Not equal
 */
export function neqv<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return (x, y) => !E.eqv(x, y);
}

export function lt<A>(O: Ord<A>): (x: A, y: A) => boolean {
  return (x, y) => O.compare(x, y) === LT;
}

export function gt<A>(O: Ord<A>): (x: A, y: A) => boolean {
  return (x, y) => O.compare(x, y) === GT;
}

/**
 * Return the minimum of two values
 */
export function min<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(x, y) <= 0 ? x : y);
}

/**
 * Return the maximum of two values
 */
export function max<A>(O: Ord<A>): (x: A, y: A) => A {
  return (x, y) => (O.compare(x, y) >= 0 ? x : y);
}

/**
 * Lexicographic combination: the first non-EQ result wins.
 */
export function thenCompare(first: Ordering, next: () => Ordering): Ordering {
  return first !== EQ ? first : next();
}

/**
 * Compare two numbers (also used for variant indices)
 */
export function compareNumbers(x: number, y: number): Ordering {
  return x < y ? LT : x > y ? GT : EQ;
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

/**
 * Eq by mapping to a comparable value
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => E.eqv(f(x), f(y)) };
}

/**
 * Ord by mapping to a comparable value
 */
export function ordBy<A, B>(O: Ord<B>, f: (a: A) => B): Ord<A> {
  return {
    eqv: (x, y) => O.eqv(f(x), f(y)),
    compare: (x, y) => O.compare(f(x), f(y)),
  };
}

/**
 * Eq for pairs
 */
export function eqTuple<A, B>(EA: Eq<A>, EB: Eq<B>): Eq<readonly [A, B]> {
  return { eqv: ([a1, b1], [a2, b2]) => EA.eqv(a1, a2) && EB.eqv(b1, b2) };
}

/**
 * Eq for arrays (element-wise)
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

/**
 * Ord for arrays (lexicographic, shorter prefix first)
 */
export function ordArray<A>(O: Ord<A>): Ord<readonly A[]> {
  return {
    eqv: eqArray(O).eqv,
    compare: (xs, ys) => {
      const len = Math.min(xs.length, ys.length);
      for (let i = 0; i < len; i++) {
        const cmp = O.compare(xs[i], ys[i]);
        if (cmp !== EQ) return cmp;
      }
      return compareNumbers(xs.length, ys.length);
    },
  };
}

// ============================================================================
// Common Instances
// ============================================================================

export const eqString: Eq<string> = eqStrict();

export const eqNumber: Eq<number> = eqStrict();

export const eqBoolean: Eq<boolean> = eqStrict();

export const ordNumber: Ord<number> = {
  eqv: (x, y) => x === y,
  compare: compareNumbers,
};

export const ordString: Ord<string> = {
  eqv: (x, y) => x === y,
  compare: (x, y) => (x < y ? LT : x > y ? GT : EQ),
};

/**
 * Ord for booleans (false < true)
 */
export const ordBoolean: Ord<boolean> = {
  eqv: (x, y) => x === y,
  compare: (x, y) => (x === y ? EQ : x ? GT : LT),
};
