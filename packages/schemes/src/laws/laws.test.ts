/**
 * Law Checking Tests
 */
import { describe, it, expect, afterEach } from "vitest";
import { functorLaws } from "./functor.js";
import { roundTripLaws, identityFoldLaws, fusionLaws, generalizationLaws } from "./recursive.js";
import { checkLaws, assertLaws } from "./verify.js";
import { config } from "../config.js";
import { LawViolationError } from "../errors.js";
import type { Algebra, Birecursive, Coalgebra } from "../schemes/recursive.js";
import { natBirecursive, natLayerEqK } from "../data/nat.js";
import { Nil, Cons, arrayBirecursive, listLayerFunctor, listLayerEqK } from "../data/list.js";
import { Leaf, Branch, treeBirecursive, treeLayerFunctor } from "../data/tree.js";
import type { ListLayerF, NatLayerF, TreeLayerF } from "../hkt.js";
import { eqArray, eqNumber } from "../typeclasses/eq.js";

// Adds 2 per Succ instead of 1
const brokenNat: Birecursive<number, NatLayerF> = {
  ...natBirecursive,
  embed: (layer) => (layer._tag === "Zero" ? 0 : layer.pred + 2),
};

const natRoundTrip = roundTripLaws(natBirecursive, eqNumber, natLayerEqK.liftEq(eqNumber));
const brokenRoundTrip = roundTripLaws(brokenNat, eqNumber, natLayerEqK.liftEq(eqNumber));
const naturals = { arbitrary: (i: number) => i };

afterEach(() => {
  config.reset();
});

describe("checkLaws", () => {
  it("reports every law as passed", () => {
    const report = checkLaws(natRoundTrip, naturals, { iterations: 5 });
    expect(report).toEqual({
      passed: true,
      iterations: 5,
      results: [
        { law: "embed after project", status: "passed", iterations: 5 },
        { law: "project after embed", status: "passed", iterations: 5 },
      ],
    });
  });

  it("reports the first counterexample of each law", () => {
    const report = checkLaws(brokenRoundTrip, naturals, { iterations: 5 });
    expect(report.passed).toBe(false);
    expect(report.results).toEqual([
      { law: "embed after project", status: "failed", iteration: 1, counterexample: 1 },
      { law: "project after embed", status: "failed", iteration: 1, counterexample: 1 },
    ]);
  });

  it("takes the default iteration count from config", () => {
    config.set({ laws: { iterations: 3 } });
    expect(checkLaws(natRoundTrip, naturals).iterations).toBe(3);
  });
});

describe("assertLaws", () => {
  it("returns quietly when every law holds", () => {
    expect(() => assertLaws(natRoundTrip, naturals, { iterations: 20 })).not.toThrow();
  });

  it("throws LawViolationError with the failing input", () => {
    let caught: unknown;
    try {
      assertLaws(brokenRoundTrip, naturals, { iterations: 5 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LawViolationError);
    if (caught instanceof LawViolationError) {
      expect(caught.law).toBe("embed after project");
      expect(caught.counterexample).toBe(1);
      expect(caught.iteration).toBe(1);
      expect(caught.message).toBe('Law "embed after project" failed at iteration 1');
    }
  });
});

describe("law sets", () => {
  const sum: Algebra<ListLayerF<number>, number> = (layer) =>
    layer._tag === "Nil" ? 0 : layer.head + layer.tail;
  const upTo = (i: number): readonly number[] => Array.from({ length: i % 6 }, (_, j) => j * 3);

  it("functorLaws hold for the list layer", () => {
    const laws = functorLaws<ListLayerF<number>, number>(
      listLayerFunctor<number>(),
      listLayerEqK(eqNumber).liftEq(eqNumber),
      (x) => x + 1,
      (x) => x * 2,
    );
    assertLaws(laws, { arbitrary: (i) => (i % 2 === 0 ? Nil : Cons(i, i * 7)) }, { iterations: 10 });
  });

  it("identityFoldLaws hold for arrays", () => {
    assertLaws(identityFoldLaws(arrayBirecursive<number>(), eqArray(eqNumber)), { arbitrary: upTo }, { iterations: 10 });
  });

  it("fusionLaws hold for the Fibonacci call tree", () => {
    const split: Coalgebra<TreeLayerF<number>, number> = (n) => (n < 2 ? Leaf(n) : Branch(n - 1, n - 2));
    const total: Algebra<TreeLayerF<number>, number> = (t) => (t._tag === "Leaf" ? t.value : t.left + t.right);
    const laws = fusionLaws(treeLayerFunctor<number>(), treeBirecursive<number>(), treeBirecursive<number>(), total, split, eqNumber);
    assertLaws(laws, { arbitrary: (i) => i % 12 }, { iterations: 12 });
  });

  it("generalizationLaws hold for arrays", () => {
    const arrays = arrayBirecursive<number>();
    const laws = generalizationLaws(arrays, sum, arrays.project, eqNumber, eqArray(eqNumber));
    expect(laws.map((law) => law.name)).toEqual([
      "gcata with distCata",
      "gana with distAna",
      "para forgetting subterms",
      "histo reading heads",
      "apo never stopping",
    ]);
    assertLaws(laws, { arbitrary: upTo }, { iterations: 10 });
  });
});
