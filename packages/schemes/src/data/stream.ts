/**
 * Infinite streams
 *
 * A stream layer always has a head and a tail, so the least fixed point is
 * empty: streams only exist coinductively, as `Nu<StreamLayerF<A>>`. They are
 * consumed with bounded readers (`takeStream`) or pulled one element at a
 * time (`streamIterator`); folding one never terminates.
 */

import type { StreamLayerF } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Eq, EqK, Ord, OrdK } from "../typeclasses/eq.js";
import { thenCompare } from "../typeclasses/eq.js";
import type { Show, ShowK } from "../typeclasses/show.js";
import type { Birecursive } from "../schemes/recursive.js";
import { Nu, nuBirecursive } from "../fixpoint/nu.js";
import { PreconditionError } from "../errors.js";

export interface StreamLayer<A, X> {
  readonly head: A;
  readonly tail: X;
}

export type Stream<A> = Nu<StreamLayerF<A>>;

export function StreamLayer<A, X>(head: A, tail: X): StreamLayer<A, X> {
  return { head, tail };
}

export function streamLayerFunctor<A>(): Functor<StreamLayerF<A>> {
  return {
    map: (layer, f) => StreamLayer(layer.head, f(layer.tail)),
  };
}

export function streamBirecursive<A>(): Birecursive<Stream<A>, StreamLayerF<A>> {
  return nuBirecursive(streamLayerFunctor<A>());
}

/**
 * `seed, f(seed), f(f(seed)), ...`
 */
export function iterate<A>(f: (a: A) => A, seed: A): Stream<A> {
  return Nu<StreamLayerF<A>, A>((a) => StreamLayer(a, f(a)), seed);
}

/**
 * The first `n` elements. Steps the stream exactly `n` times.
 */
export function takeStream<A>(n: number): (stream: Stream<A>) => A[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new PreconditionError(`Expected a non-negative integer, got ${n}`, n);
  }
  const { project } = streamBirecursive<A>();
  return (stream) => {
    const out: A[] = [];
    let current = stream;
    while (out.length < n) {
      const layer = project(current);
      out.push(layer.head);
      current = layer.tail;
    }
    return out;
  };
}

/**
 * Pull elements lazily; the iterator never completes.
 *
 * @example
 * ```typescript
 * for (const n of streamIterator(iterate((x: number) => x * 2, 1))) {
 *   if (n > 100) break;
 * }
 * ```
 */
export function* streamIterator<A>(stream: Stream<A>): Generator<A, never, undefined> {
  const { project } = streamBirecursive<A>();
  let current = stream;
  for (;;) {
    const layer = project(current);
    yield layer.head;
    current = layer.tail;
  }
}

export function streamLayerEqK<A>(EA: Eq<A>): EqK<StreamLayerF<A>> {
  return {
    liftEq: <X>(EX: Eq<X>): Eq<StreamLayer<A, X>> => ({
      eqv: (x, y) => EA.eqv(x.head, y.head) && EX.eqv(x.tail, y.tail),
    }),
  };
}

export function streamLayerOrdK<A>(OA: Ord<A>): OrdK<StreamLayerF<A>> {
  const eqK = streamLayerEqK(OA);
  return {
    liftEq: eqK.liftEq,
    liftCompare: <X>(OX: Ord<X>): Ord<StreamLayer<A, X>> => ({
      eqv: eqK.liftEq(OX).eqv,
      compare: (x, y) => thenCompare(OA.compare(x.head, y.head), () => OX.compare(x.tail, y.tail)),
    }),
  };
}

/**
 * Prints `<head> :< <tail>`.
 */
export function streamLayerShowK<A>(SA: Show<A>): ShowK<StreamLayerF<A>> {
  return {
    liftShow: <X>(SX: Show<X>): Show<StreamLayer<A, X>> => ({
      show: (layer) => `${SA.show(layer.head)} :< ${SX.show(layer.tail)}`,
    }),
  };
}
