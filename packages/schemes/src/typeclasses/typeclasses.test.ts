/**
 * Typeclass Tests - derived operations and combinators
 */
import { describe, it, expect } from "vitest";
import { as, tupleLeft, lift, composeFunctor, makeFunctor } from "./functor.js";
import { map2, sequenceArray } from "./applicative.js";
import { flatten, andThen, makeMonad } from "./monad.js";
import { extend, coKleisli, makeComonad } from "./comonad.js";
import { composeTransformations, identityTransformation } from "./natural.js";
import type { NaturalTransformation } from "./natural.js";
import {
  neqv,
  lt,
  gt,
  min,
  max,
  thenCompare,
  eqBy,
  ordBy,
  eqArray,
  ordArray,
  eqNumber,
  ordNumber,
  ordString,
  ordBoolean,
  LT,
  GT,
  EQ,
} from "./eq.js";
import { showArray, showTuple, contramap, makeShow, showNumber, showString, showBoolean } from "./show.js";
import { Cons, Nil, listLayerFunctor } from "../data/list.js";
import type { ListLayer } from "../data/list.js";
import { env, envComonad } from "../data/env.js";
import type { Env } from "../data/env.js";
import { Left, Right, eitherMonad } from "../data/either.js";
import type { Either } from "../data/either.js";
import { idMonad } from "../data/id.js";
import type { EitherF, EnvF, ListLayerF } from "../hkt.js";

const times10: NaturalTransformation<ListLayerF<number>, ListLayerF<number>> = {
  transform: (layer) => (layer._tag === "Nil" ? layer : Cons(layer.head * 10, layer.tail)),
};

// ============================================================================
// Functor
// ============================================================================

describe("Functor", () => {
  it("as and tupleLeft replace or pair the contents", () => {
    expect(as(idMonad)(3, "x")).toBe("x");
    expect(tupleLeft<EnvF<string>>(envComonad<string>())(env("e", 1), true)).toEqual(["e", [true, 1]]);
  });

  it("lift turns a function into one over F", () => {
    const double = lift(listLayerFunctor<number>())((n: number) => n * 2);
    expect(double(Cons(1, 4))).toEqual(Cons(1, 8));
    expect(double(Nil)).toBe(Nil);
  });

  it("composeFunctor maps through both layers", () => {
    const F = composeFunctor<ListLayerF<number>, EnvF<string>>(listLayerFunctor<number>(), envComonad<string>());
    expect(F.map(Cons(1, env("e", 2)), (n: number) => n * 10)).toEqual(Cons(1, ["e", 20]));
  });

  it("makeFunctor builds an instance from map", () => {
    const F = makeFunctor<EnvF<string>>(([e, a], f) => [e, f(a)]);
    expect(F.map(env("e", 2), (n: number) => n + 1)).toEqual(["e", 3]);
  });
});

// ============================================================================
// Applicative / Monad
// ============================================================================

describe("Applicative and Monad", () => {
  const M = eitherMonad<string>();

  it("map2 combines two successes and keeps the first failure", () => {
    const add = map2<EitherF<string>>(M)<number, number, number>;
    expect(add(Right(1), Right(2), (a, b) => a + b)).toEqual(Right(3));
    expect(add(Left("first"), Left("second"), (a, b) => a + b)).toEqual(Left("first"));
  });

  it("sequenceArray collects every value or stops at a Left", () => {
    const sequence = sequenceArray<EitherF<string>>(M)<number>;
    expect(sequence([Right(1), Right(2)])).toEqual(Right([1, 2]));
    expect(sequence([Right(1), Left("x"), Left("y")])).toEqual(Left("x"));
    expect(sequence([])).toEqual(Right([]));
  });

  it("flatten removes one level of nesting", () => {
    expect(flatten<EitherF<string>>(M)<number>(Right(Right(1)))).toEqual(Right(1));
    expect(flatten<EitherF<string>>(M)<number>(Right(Left("inner")))).toEqual(Left("inner"));
  });

  it("andThen chains two steps", () => {
    const step = andThen<EitherF<string>>(M)<number, number, number>(
      (n) => Right(n + 1),
      (n): Either<string, number> => (n > 2 ? Left("too big") : Right(n)),
    );
    expect(step(1)).toEqual(Right(2));
    expect(step(2)).toEqual(Left("too big"));
  });

  it("makeMonad derives ap from flatMap and map", () => {
    const built = makeMonad<EitherF<string>>(M.map, M.flatMap, M.pure);
    expect(built.ap<number, number>(Right((n: number) => n * 3), Right(2))).toEqual(Right(6));
    expect(built.ap<number, number>(Left<string, (n: number) => number>("no"), Right(2))).toEqual(Left("no"));
  });
});

// ============================================================================
// Comonad
// ============================================================================

describe("Comonad", () => {
  const W = envComonad<number>();
  const total = (w: Env<number, number>): number => w[0] + w[1];

  it("extend runs a context-reading function at the focus", () => {
    expect(extend(W)(env(10, 1), total)).toEqual([10, 11]);
  });

  it("coKleisli composes context-reading functions", () => {
    const composed = coKleisli(W)<number, number, number>(total, (w) => w[1] * 2);
    expect(composed(env(10, 1))).toBe(22);
  });

  it("makeComonad builds an instance", () => {
    const built = makeComonad<EnvF<number>>(W.map, W.extract, W.duplicate);
    expect(built.extract(env(0, "a"))).toBe("a");
  });
});

// ============================================================================
// Natural transformations
// ============================================================================

describe("NaturalTransformation", () => {
  it("composeTransformations runs the first one first", () => {
    const twice = composeTransformations(times10, times10);
    const layer: ListLayer<number, string> = Cons(1, "x");
    expect(twice.transform(layer)).toEqual(Cons(100, "x"));
  });

  it("identityTransformation leaves the layer alone", () => {
    const layer: ListLayer<number, string> = Cons(1, "x");
    expect(identityTransformation<ListLayerF<number>>().transform(layer)).toBe(layer);
  });
});

// ============================================================================
// Eq / Ord
// ============================================================================

describe("Eq and Ord", () => {
  it("derived comparisons", () => {
    expect(neqv(eqNumber)(1, 2)).toBe(true);
    expect(lt(ordNumber)(1, 2)).toBe(true);
    expect(gt(ordNumber)(1, 2)).toBe(false);
    expect(min(ordString)("b", "a")).toBe("a");
    expect(max(ordString)("b", "a")).toBe("b");
  });

  it("thenCompare only evaluates the tie-breaker on EQ", () => {
    let called = false;
    expect(
      thenCompare(LT, () => {
        called = true;
        return GT;
      }),
    ).toBe(LT);
    expect(called).toBe(false);
    expect(thenCompare(EQ, () => GT)).toBe(GT);
  });

  it("eqBy and ordBy compare by a key", () => {
    const byLength = ordBy(ordNumber, (s: string) => s.length);
    expect(eqBy(eqNumber, (s: string) => s.length).eqv("ab", "cd")).toBe(true);
    expect(byLength.compare("abc", "z")).toBe(GT);
  });

  it("arrays compare element-wise, shorter prefix first", () => {
    expect(eqArray(eqNumber).eqv([1, 2], [1, 2])).toBe(true);
    expect(eqArray(eqNumber).eqv([1, 2], [1])).toBe(false);
    expect(ordArray(ordNumber).compare([1, 2], [1, 2, 3])).toBe(LT);
    expect(ordArray(ordNumber).compare([2], [1, 5])).toBe(GT);
  });

  it("false sorts before true", () => {
    expect(ordBoolean.compare(false, true)).toBe(LT);
    expect(ordBoolean.compare(true, true)).toBe(EQ);
  });
});

// ============================================================================
// Show
// ============================================================================

describe("Show", () => {
  it("prints arrays, pairs and mapped values", () => {
    expect(showArray(showNumber).show([1, 2])).toBe("[1, 2]");
    expect(showTuple(showString, showBoolean).show(["a", true])).toBe('("a", true)');
    expect(contramap(showNumber, (s: string) => s.length).show("abc")).toBe("3");
    expect(makeShow((n: number) => `#${n}`).show(4)).toBe("#4");
  });
});
