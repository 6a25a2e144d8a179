/**
 * Arithmetic expressions with a hand-written pattern layer
 *
 * `ExprLayer` is what a pattern generator would emit for `Expr`: one
 * variant per constructor, suffixed `F`; non-recursive fields copied; every
 * field holding an `Expr` (directly or inside an array) becomes the open
 * position `X`. `project` and `embed` are the two conversions between them.
 */

import type { TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Algebra, Birecursive, Coalgebra } from "../schemes/recursive.js";

// ============================================================================
// The recursive type
// ============================================================================

export type Expr<A> =
  | { readonly _tag: "Lit"; readonly value: A }
  | { readonly _tag: "Add"; readonly left: Expr<A>; readonly right: Expr<A> }
  | { readonly _tag: "Mul"; readonly factor: Expr<A>; readonly factors: readonly Expr<A>[] };

export const Lit = <A>(value: A): Expr<A> => ({ _tag: "Lit", value });
export const Add = <A>(left: Expr<A>, right: Expr<A>): Expr<A> => ({ _tag: "Add", left, right });
export const Mul = <A>(factor: Expr<A>, factors: readonly Expr<A>[]): Expr<A> => ({
  _tag: "Mul",
  factor,
  factors,
});

// ============================================================================
// Its pattern layer
// ============================================================================

export type ExprLayer<A, X> =
  | { readonly _tag: "LitF"; readonly value: A }
  | { readonly _tag: "AddF"; readonly left: X; readonly right: X }
  | { readonly _tag: "MulF"; readonly factor: X; readonly factors: readonly X[] };

export interface ExprLayerF<A> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: ExprLayer<A, this["__kind__"]>;
}

export const LitF = <A, X>(value: A): ExprLayer<A, X> => ({ _tag: "LitF", value });
export const AddF = <A, X>(left: X, right: X): ExprLayer<A, X> => ({ _tag: "AddF", left, right });
export const MulF = <A, X>(factor: X, factors: readonly X[]): ExprLayer<A, X> => ({
  _tag: "MulF",
  factor,
  factors,
});

export function exprLayerFunctor<A>(): Functor<ExprLayerF<A>> {
  return {
    map: <X, Y>(layer: ExprLayer<A, X>, f: (x: X) => Y): ExprLayer<A, Y> => {
      switch (layer._tag) {
        case "LitF":
          return layer;
        case "AddF":
          return AddF(f(layer.left), f(layer.right));
        case "MulF":
          return MulF(f(layer.factor), layer.factors.map(f));
      }
    },
  };
}

export function exprBirecursive<A>(): Birecursive<Expr<A>, ExprLayerF<A>> {
  return {
    functor: exprLayerFunctor<A>(),
    project: (expr) => {
      switch (expr._tag) {
        case "Lit":
          return LitF(expr.value);
        case "Add":
          return AddF(expr.left, expr.right);
        case "Mul":
          return MulF(expr.factor, expr.factors);
      }
    },
    embed: (layer) => {
      switch (layer._tag) {
        case "LitF":
          return Lit(layer.value);
        case "AddF":
          return Add(layer.left, layer.right);
        case "MulF":
          return Mul(layer.factor, layer.factors);
      }
    },
  };
}

// ============================================================================
// Algebras
// ============================================================================

export const evalAlgebra: Algebra<ExprLayerF<number>, number> = (layer) => {
  switch (layer._tag) {
    case "LitF":
      return layer.value;
    case "AddF":
      return layer.left + layer.right;
    case "MulF":
      return layer.factors.reduce((acc, x) => acc * x, layer.factor);
  }
};

/**
 * Splits `n` into an expression that evaluates back to `n`: below 5 a
 * literal, even numbers as `2 * (n / 2)`, odd ones as `h + (n - h)`.
 */
export const divCoalgebra: Coalgebra<ExprLayerF<number>, number> = (n) => {
  const half = Math.floor(n / 2);
  if (n < 5) return LitF(n);
  if (n % 2 === 0) return MulF(2, [half]);
  return AddF(half, n - half);
};
