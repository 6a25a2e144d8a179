/**
 * Non-Empty Sequence Tests
 */
import { describe, it, expect } from "vitest";
import {
  Last,
  More,
  isNonEmpty,
  nonEmptyBirecursive,
  nonEmptyLayerEqK,
  nonEmptyLayerOrdK,
  nonEmptyLayerShowK,
} from "./non-empty.js";
import { cata } from "../schemes/fold.js";
import { ana } from "../schemes/unfold.js";
import { eqNumber, ordNumber, LT, GT } from "../typeclasses/eq.js";
import { showNumber } from "../typeclasses/show.js";

describe("NonEmptyArray", () => {
  const B = nonEmptyBirecursive<number>();

  it("isNonEmpty", () => {
    expect(isNonEmpty([])).toBe(false);
    expect(isNonEmpty([0])).toBe(true);
  });

  it("project ends in Last", () => {
    expect(B.project([1])).toEqual(Last(1));
    expect(B.project([1, 2])).toEqual(More(1, [2]));
  });

  it("embed prepends the head", () => {
    expect(B.embed(More(0, [1]))).toEqual([0, 1]);
    expect(B.embed(Last(5))).toEqual([5]);
  });

  it("cata folds without a seed value", () => {
    const maximum = cata(B)<number>((layer) =>
      layer._tag === "Last" ? layer.head : Math.max(layer.head, layer.tail),
    );
    expect(maximum([3, 9, 2])).toBe(9);
    expect(maximum([4])).toBe(4);
  });

  it("ana unfolds a range", () => {
    const range = ana(B)((n: number) => (n === 1 ? Last(1) : More(n, n - 1)));
    expect(range(3)).toEqual([3, 2, 1]);
  });
});

describe("NonEmptyLayer instances", () => {
  it("liftEq distinguishes Last from More", () => {
    const eq = nonEmptyLayerEqK(eqNumber).liftEq(eqNumber);
    expect(eq.eqv(Last(1), Last(1))).toBe(true);
    expect(eq.eqv(Last(1), More(1, 0))).toBe(false);
  });

  it("liftCompare compares heads first", () => {
    const ord = nonEmptyLayerOrdK(ordNumber).liftCompare(ordNumber);
    expect(ord.compare(Last(1), More(1, 0))).toBe(LT);
    expect(ord.compare(More(2, 0), Last(1))).toBe(GT);
    expect(ord.compare(More(1, 5), More(1, 4))).toBe(GT);
  });

  it("liftShow prints one layer", () => {
    expect(nonEmptyLayerShowK(showNumber).liftShow(showNumber).show(More(1, 2))).toBe("More(1, 2)");
  });
});
