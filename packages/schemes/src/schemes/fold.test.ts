/**
 * Fold Tests
 */
import { describe, it, expect } from "vitest";
import { cata, cataA, gcata, para, gpara, zygo, gzygo, histo, ghisto, prepro, gprepro, zygoHistoPrepro } from "./fold.js";
import type { CVAlgebra } from "./fold.js";
import type { Algebra } from "./recursive.js";
import { makeBirecursive, makeRecursive } from "./recursive.js";
import { distCata } from "./distributive.js";
import { Nil, Cons, arrayBirecursive, listBirecursive, listLayerFunctor, fromArray } from "../data/list.js";
import { idComonad } from "../data/id.js";
import { natBirecursive } from "../data/nat.js";
import type { ConstF, IdF, ListLayerF, NatLayerF } from "../hkt.js";
import type { NaturalTransformation } from "../typeclasses/natural.js";
import { identityTransformation } from "../typeclasses/natural.js";

const sum: Algebra<ListLayerF<number>, number> = (layer) =>
  layer._tag === "Nil" ? 0 : layer.head + layer.tail;

const length: Algebra<ListLayerF<number>, number> = (layer) =>
  layer._tag === "Nil" ? 0 : layer.tail + 1;

const filterLT10: NaturalTransformation<ListLayerF<number>, ListLayerF<number>> = {
  transform: (layer) => (layer._tag === "Cons" && layer.head >= 10 ? Nil : layer),
};

const times10: NaturalTransformation<ListLayerF<number>, ListLayerF<number>> = {
  transform: (layer) => (layer._tag === "Nil" ? layer : Cons(layer.head * 10, layer.tail)),
};

// Adds each element or subtracts it, depending on how many elements follow it
const alternating = zygo(arrayBirecursive<number>())<number, number>(length, (layer) => {
  if (layer._tag === "Nil") return 0;
  const [remaining, acc] = layer.tail;
  return remaining % 2 === 0 ? acc + layer.head : acc - layer.head;
});

// Sum of the elements at even positions: reads two layers back
const skipOne: CVAlgebra<ListLayerF<number>, number> = (layer) => {
  if (layer._tag === "Nil") return 0;
  const rest = layer.tail.tail;
  return layer.head + (rest._tag === "Cons" ? rest.tail.head : 0);
};

describe("cata", () => {
  it("uses the specialized fold of arrays", () => {
    expect(cata(arrayBirecursive<number>())(sum)([1, 2, 3])).toBe(6);
  });

  it("folds a List", () => {
    expect(cata(listBirecursive<number>())(sum)(fromArray([1, 2, 3]))).toBe(6);
    expect(cata(listBirecursive<number>())(sum)(Nil)).toBe(0);
  });
});

describe("capability helpers", () => {
  it("makeRecursive and makeBirecursive fold without a specialized cata", () => {
    const arrays = arrayBirecursive<number>();
    const R = makeRecursive<readonly number[], ListLayerF<number>>(listLayerFunctor<number>(), arrays.project);
    const B = makeBirecursive<readonly number[], ListLayerF<number>>(
      listLayerFunctor<number>(),
      arrays.project,
      arrays.embed,
    );
    expect(R.cata).toBeUndefined();
    expect(cata(R)(sum)([1, 2, 3])).toBe(6);
    expect(cata(B)<readonly number[]>(B.embed)([1, 2])).toEqual([1, 2]);
  });
});

describe("cataA", () => {
  it("folds into a type-function result", () => {
    const first = cataA(arrayBirecursive<string>())<ConstF<string>, number>((layer) =>
      layer._tag === "Nil" ? "" : layer.head,
    );
    expect(first([..."hello"])).toBe("h");
  });
});

describe("gcata", () => {
  it("with Id and distCata is cata", () => {
    const viaId = gcata(arrayBirecursive<number>())<IdF, number>(idComonad, distCata<ListLayerF<number>>(), sum);
    expect(viaId([1, 2, 3])).toBe(6);
    expect(viaId([])).toBe(0);
  });
});

describe("para", () => {
  it("sees every suffix", () => {
    const suffixes = para(arrayBirecursive<number>())<(readonly number[])[]>((layer) =>
      layer._tag === "Nil" ? [] : [layer.tail[0], ...layer.tail[1]],
    );
    expect(suffixes([1, 2, 3])).toEqual([[2, 3], [3], []]);
  });

  it("gpara over Id exposes the subterm as the environment", () => {
    const subtermLengths = gpara(arrayBirecursive<number>())<IdF, number>(
      idComonad,
      distCata<ListLayerF<number>>(),
      (layer) => (layer._tag === "Nil" ? 0 : layer.tail.ask.length + layer.tail.lower),
    );
    expect(subtermLengths([1, 2, 3])).toBe(3);
  });
});

describe("zygo", () => {
  it("pairs each result with the helper fold", () => {
    expect(alternating([1, 2, 3])).toBe(2);
    expect(alternating([])).toBe(0);
  });

  it("gzygo over Id agrees with zygo", () => {
    const viaId = gzygo(arrayBirecursive<number>())<number, IdF, number>(
      length,
      idComonad,
      distCata<ListLayerF<number>>(),
      (layer) => {
        if (layer._tag === "Nil") return 0;
        const { ask: remaining, lower: acc } = layer.tail;
        return remaining % 2 === 0 ? acc + layer.head : acc - layer.head;
      },
    );
    expect(viaId([1, 2, 3])).toBe(alternating([1, 2, 3]));
  });
});

describe("histo", () => {
  it("reads results from further down", () => {
    expect(histo(arrayBirecursive<number>())(skipOne)([1, 2, 3, 4, 5])).toBe(9);
    expect(histo(arrayBirecursive<number>())(skipOne)([5])).toBe(5);
  });

  it("calls the algebra once per layer", () => {
    let calls = 0;
    const fib: CVAlgebra<NatLayerF, number> = (layer) => {
      calls++;
      if (layer._tag === "Zero") return 0;
      const prev = layer.pred;
      return prev.tail._tag === "Zero" ? 1 : prev.head + prev.tail.pred.head;
    };
    expect(histo(natBirecursive)(fib)(10)).toBe(55);
    expect(calls).toBe(11);

    calls = 0;
    histo(natBirecursive)(fib)(400);
    expect(calls).toBe(401);
  });

  it("annotates a 100000-element List without growing the stack", () => {
    const ones = fromArray(Array.from({ length: 100_000 }, () => 1));
    const countAll: CVAlgebra<ListLayerF<number>, number> = (layer) =>
      layer._tag === "Nil" ? 0 : layer.head + layer.tail.head;
    expect(histo(listBirecursive<number>())(countAll)(ones)).toBe(100_000);
  });

  it("ghisto over Id agrees with histo", () => {
    const viaId = ghisto(arrayBirecursive<number>())<IdF, number>(
      idComonad,
      distCata<ListLayerF<number>>(),
      (layer) => {
        if (layer._tag === "Nil") return 0;
        const rest = layer.tail.run.tail;
        return layer.head + (rest._tag === "Cons" ? rest.tail.run.head : 0);
      },
    );
    expect(viaId([1, 2, 3, 4, 5])).toBe(9);
  });
});

describe("prepro", () => {
  it("stops at the first element >= 10", () => {
    expect(prepro(arrayBirecursive<number>())(filterLT10, sum)([1, 2, 10, 3])).toBe(3);
  });

  it("rewrites deeper subterms more times", () => {
    // 1 + 2 * 10 + 3 * 100
    expect(prepro(arrayBirecursive<number>())(times10, sum)([1, 2, 3])).toBe(321);
  });

  it("gprepro over Id agrees with prepro", () => {
    const viaId = gprepro(arrayBirecursive<number>())<IdF, number>(
      idComonad,
      distCata<ListLayerF<number>>(),
      times10,
      sum,
    );
    expect(viaId([1, 2, 3])).toBe(321);
  });

  it("zygoHistoPrepro gives the algebra the helper and the history", () => {
    const fold = zygoHistoPrepro(arrayBirecursive<number>())<number, number>(
      length,
      identityTransformation<ListLayerF<number>>(),
      (layer) => {
        if (layer._tag === "Nil") return 0;
        const remaining = layer.tail.ask;
        const acc = layer.tail.lower.head;
        return remaining % 2 === 0 ? acc + layer.head : acc - layer.head;
      },
    );
    expect(fold([1, 2, 3])).toBe(2);
  });
});
