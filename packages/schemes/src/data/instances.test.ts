/**
 * Auxiliary Structure Tests - Id, Env, EnvT, Cofree, Free, Either, ExceptT, Const
 */
import { describe, it, expect } from "vitest";
import { idMonad, idComonad } from "./id.js";
import { env, ask, envComonad, envT, envTComonad } from "./env.js";
import type { EnvT } from "./env.js";
import { cofree, cofreeComonad, cofreeBirecursive } from "./cofree.js";
import type { Cofree } from "./cofree.js";
import { Pure, Wrap, freeMonad, freeBirecursive } from "./free.js";
import type { Free } from "./free.js";
import { Left, Right, eitherMonad, getEq, getShow, isLeft, isRight } from "./either.js";
import type { Either } from "./either.js";
import { exceptTMonad, throwE } from "./except.js";
import { constBirecursive } from "./const.js";
import { Zero, Succ, natLayerFunctor, natLayerEqK } from "./nat.js";
import type { NatLayer } from "./nat.js";
import type { EitherF, EnvF, EnvTF, CofreeF, FreeF, IdF, NatLayerF } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import { eqNumber, eqString, eqTuple } from "../typeclasses/eq.js";
import { showNumber, showString } from "../typeclasses/show.js";
import { comonadLaws, monadLaws } from "../laws/functor.js";
import { assertLaws } from "../laws/verify.js";
import { cata } from "../schemes/fold.js";

// ============================================================================
// Fixtures
// ============================================================================

const annotated = (n: number): Cofree<NatLayerF, number> =>
  cofree<NatLayerF, number>(n, n === 0 ? Zero : Succ(annotated(n - 1)));

const eqCofree: Eq<Cofree<NatLayerF, number>> = {
  eqv: (x, y) => x.head === y.head && natLayerEqK.liftEq(eqCofree).eqv(x.tail, y.tail),
};

const wrap = (layer: NatLayer<Free<NatLayerF, number>>): Free<NatLayerF, number> =>
  Wrap<NatLayerF, Free<NatLayerF, number>>(layer);

const eqFree: Eq<Free<NatLayerF, number>> = {
  eqv: (x, y) => {
    if (x._tag === "Pure") return y._tag === "Pure" && x.value === y.value;
    return y._tag === "Wrap" && natLayerEqK.liftEq(eqFree).eqv(x.layer, y.layer);
  },
};

// ============================================================================
// Comonads
// ============================================================================

describe("Id", () => {
  it("is both a monad and a comonad with no wrapper", () => {
    expect(idMonad.flatMap(3, (x: number) => x + 1)).toBe(4);
    expect(idMonad.pure("a")).toBe("a");
    expect(idComonad.extract(5)).toBe(5);
    expect(idComonad.duplicate(5)).toBe(5);
  });
});

describe("Env", () => {
  it("carries its environment through map and duplicate", () => {
    const W = envComonad<string>();
    expect(W.map(env("ctx", 2), (n: number) => n * 3)).toEqual(["ctx", 6]);
    expect(W.duplicate(env("ctx", 2))).toEqual(["ctx", ["ctx", 2]]);
    expect(ask(env("ctx", 2))).toBe("ctx");
  });

  it("satisfies the comonad laws", () => {
    const laws = comonadLaws<EnvF<string>, number>(envComonad<string>(), eqTuple(eqString, eqNumber));
    assertLaws(laws, { arbitrary: (i) => env(`e${i % 3}`, i) }, { iterations: 20 });
  });
});

describe("EnvT", () => {
  const eqEnvT: Eq<EnvT<string, IdF, number>> = {
    eqv: (x, y) => x.ask === y.ask && x.lower === y.lower,
  };

  it("extract reads through to the inner comonad", () => {
    const W = envTComonad<string, IdF>(idComonad);
    expect(W.extract(envT<string, IdF, number>("ctx", 7))).toBe(7);
  });

  it("satisfies the comonad laws over Id", () => {
    const laws = comonadLaws<EnvTF<string, IdF>, number>(envTComonad<string, IdF>(idComonad), eqEnvT);
    assertLaws(laws, { arbitrary: (i) => envT<string, IdF, number>("ctx", i) }, { iterations: 20 });
  });
});

describe("Cofree", () => {
  const W = cofreeComonad(natLayerFunctor);

  it("duplicate puts each subtree at its own position", () => {
    const value = annotated(2);
    const dup = W.duplicate<number>(value);
    expect(dup.head).toBe(value);
    expect(dup.tail._tag === "Succ" && dup.tail.pred.head.head).toBe(1);
  });

  it("map rewrites every annotation", () => {
    expect(eqCofree.eqv(W.map(annotated(2), (n: number) => n), annotated(2))).toBe(true);
    expect(W.map(annotated(1), (n: number) => n * 10).head).toBe(10);
  });

  it("is its own one-layer view", () => {
    const sumHeads = cata(cofreeBirecursive<NatLayerF, number>(natLayerFunctor))<number>(
      (layer) => layer.head + (layer.tail._tag === "Zero" ? 0 : layer.tail.pred),
    );
    expect(sumHeads(annotated(2))).toBe(3);
  });

  it("satisfies the comonad laws", () => {
    const laws = comonadLaws<CofreeF<NatLayerF>, number>(W, eqCofree);
    assertLaws(laws, { arbitrary: (i) => annotated(i % 5) }, { iterations: 10 });
  });
});

// ============================================================================
// Monads
// ============================================================================

describe("Free", () => {
  const M = freeMonad(natLayerFunctor);

  it("flatMap substitutes at the leaves", () => {
    const program = wrap(Succ(Pure(1)));
    expect(M.flatMap(program, (n: number) => Pure(n + 1))).toEqual(wrap(Succ(Pure(2))));
    expect(M.flatMap(wrap(Zero), (n: number) => Pure(n + 1))).toEqual(wrap(Zero));
  });

  it("is its own one-layer view", () => {
    const countWraps = cata(freeBirecursive<NatLayerF, number>(natLayerFunctor))<number>((layer) => {
      if (layer._tag === "Pure") return layer.value;
      return layer.layer._tag === "Zero" ? 0 : layer.layer.pred + 1;
    });
    expect(countWraps(wrap(Succ(Pure(5))))).toBe(6);
    expect(countWraps(wrap(Zero))).toBe(0);
  });

  it("satisfies the monad laws", () => {
    const laws = monadLaws<FreeF<NatLayerF>, number>(
      M,
      eqFree,
      (a) => wrap(Succ(Pure(a + 1))),
      (a) => Pure(a * 2),
    );
    assertLaws(
      laws,
      { arbitrary: (i) => (i % 3 === 0 ? Pure(i) : i % 3 === 1 ? wrap(Succ(Pure(i))) : wrap(Zero)) },
      { iterations: 12 },
    );
  });
});

describe("Either", () => {
  const M = eitherMonad<string>();

  it("short-circuits on Left", () => {
    expect(M.flatMap(Left<string, number>("no"), (n: number) => Right(n + 1))).toEqual(Left("no"));
    expect(M.flatMap(Right<string, number>(1), (n: number) => Right(n + 1))).toEqual(Right(2));
  });

  it("isLeft and isRight test the tag", () => {
    const l: Either<string, number> = Left("e");
    const r: Either<string, number> = Right(1);
    expect([isLeft(l), isRight(l)]).toEqual([true, false]);
    expect([isLeft(r), isRight(r)]).toEqual([false, true]);
  });

  it("never equates a Left with a Right", () => {
    const eq = getEq(eqNumber, eqNumber);
    expect(eq.eqv(Left(1), Right(1))).toBe(false);
    expect(eq.eqv(Right(1), Left(1))).toBe(false);
    expect(eq.eqv(Right(1), Right(1))).toBe(true);
  });

  it("prints Left(...) and Right(...)", () => {
    const show = getShow(showString, showNumber);
    expect(show.show(Left("e"))).toBe('Left("e")');
    expect(show.show(Right(3))).toBe("Right(3)");
  });

  it("satisfies the monad laws", () => {
    const laws = monadLaws<EitherF<string>, number>(
      M,
      getEq(eqString, eqNumber),
      (a): Either<string, number> => (a > 5 ? Left("big") : Right(a + 1)),
      (a) => Right(a * 2),
    );
    assertLaws(laws, { arbitrary: (i) => (i % 4 === 0 ? Left("no") : Right(i)) }, { iterations: 20 });
  });
});

describe("ExceptT", () => {
  const M = exceptTMonad<string, IdF>(idMonad);

  it("pure wraps a Right", () => {
    expect(M.pure(3).run).toEqual(Right(3));
  });

  it("throwE skips the rest of the computation", () => {
    const failed = throwE<string, IdF>(idMonad)<number>("boom");
    expect(M.flatMap(failed, (n: number) => M.pure(n + 1)).run).toEqual(Left("boom"));
  });
});

describe("Const", () => {
  it("folds a non-recursive value with a single algebra call", () => {
    expect(cata(constBirecursive<string>())<number>((s) => s.length)("hello")).toBe(5);
  });
});
