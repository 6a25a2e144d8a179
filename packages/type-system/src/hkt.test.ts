/**
 * HKT and Existential Tests
 */
import { describe, it, expect } from "vitest";
import type { $, Kind, TypeFunction } from "./hkt.js";
import type { Equal, Expect } from "./type-utils.js";
import { packExists, useExists, mapExists } from "./existential.js";

interface PairF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: readonly [E, this["__kind__"]];
}

interface CounterF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: {
    readonly state: this["__kind__"];
    readonly next: (s: this["__kind__"]) => this["__kind__"];
    readonly render: (s: this["__kind__"]) => string;
  };
}

// ============================================================================
// Type-level resolution
// ============================================================================

type _PairResolves = Expect<Equal<$<PairF<string>, number>, readonly [string, number]>>;
type _KindIsDollar = Expect<Equal<Kind<PairF<boolean>, number>, $<PairF<boolean>, number>>>;
type _NestedResolves = Expect<
  Equal<$<PairF<number>, $<PairF<string>, boolean>>, readonly [number, readonly [string, boolean]]>
>;

function mapPair<E, A, B>(fa: $<PairF<E>, A>, f: (a: A) => B): $<PairF<E>, B> {
  return [fa[0], f(fa[1])];
}

describe("Kind", () => {
  it("resolves known type functions to their concrete types", () => {
    const pair: Kind<PairF<string>, number> = ["n", 1];
    expect(pair[1] + 1).toBe(2);
  });

  it("lets generic code see the concrete shape", () => {
    expect(mapPair(["tag", 20], (n) => n + 1)).toEqual(["tag", 21]);
  });
});

// ============================================================================
// Existentials
// ============================================================================

describe("Exists", () => {
  const numberCounter = packExists<CounterF, number>({
    state: 0,
    next: (n) => n + 1,
    render: (n) => `#${n}`,
  });

  const stringCounter = packExists<CounterF, string>({
    state: "",
    next: (s) => `${s}|`,
    render: (s) => `[${s}]`,
  });

  it("useExists runs the continuation on the hidden witness", () => {
    const rendered = useExists(numberCounter, (c) => c.render(c.next(c.next(c.state))));
    expect(rendered).toBe("#2");
  });

  it("existentials with different hidden types share one type", () => {
    const counters = [numberCounter, stringCounter];
    const rendered = counters.map((counter) => counter.use((c) => c.render(c.next(c.state))));
    expect(rendered).toEqual(["#1", "[|]"]);
  });

  it("mapExists post-processes the continuation result", () => {
    const length = mapExists(
      stringCounter,
      (c) => c.render(c.next(c.next(c.state))),
      (s) => s.length,
    );
    expect(length).toBe(4);
  });
});
