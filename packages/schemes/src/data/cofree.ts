/**
 * Cofree Comonad
 *
 * A Cofree<F, A> is an F-shaped tree where every node carries an A. As the
 * comonad of a histomorphism it holds, for each subterm, the fold result at
 * that subterm (`head`) together with the annotated subterms below it
 * (`tail`): the full history of the fold.
 *
 * CofreeT<F, W, A> interleaves another comonad W at every node.
 */

import type { $, CofreeF, CofreeLayerF, CofreeTF, TypeFunction } from "../hkt.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Comonad } from "../typeclasses/comonad.js";
import { extend } from "../typeclasses/comonad.js";
import type { Birecursive } from "../schemes/recursive.js";

// ============================================================================
// Cofree
// ============================================================================

export interface Cofree<F extends TypeFunction, A> {
  readonly head: A;
  readonly tail: $<F, Cofree<F, A>>;
}

/**
 * One node of a Cofree with the recursive position left open.
 * `Cofree<F, A>` is the fixed point of `CofreeLayer<F, A, _>`.
 */
export interface CofreeLayer<F extends TypeFunction, A, X> {
  readonly head: A;
  readonly tail: $<F, X>;
}

export function cofree<F extends TypeFunction, A>(head: A, tail: $<F, Cofree<F, A>>): Cofree<F, A> {
  return { head, tail };
}

export function cofreeComonad<F extends TypeFunction>(F: Functor<F>): Comonad<CofreeF<F>> {
  const map = <A, B>(wa: Cofree<F, A>, f: (a: A) => B): Cofree<F, B> => ({
    head: f(wa.head),
    tail: F.map(wa.tail, (child: Cofree<F, A>) => map(child, f)),
  });
  const duplicate = <A>(wa: Cofree<F, A>): Cofree<F, Cofree<F, A>> => ({
    head: wa,
    tail: F.map(wa.tail, duplicate),
  });
  return {
    map,
    extract: (wa) => wa.head,
    duplicate,
  };
}

export function cofreeLayerFunctor<F extends TypeFunction, A>(
  F: Functor<F>,
): Functor<CofreeLayerF<F, A>> {
  return {
    map: (layer, f) => ({ head: layer.head, tail: F.map(layer.tail, f) }),
  };
}

/**
 * A Cofree is its own one-layer view: `project` and `embed` are identities.
 */
export function cofreeBirecursive<F extends TypeFunction, A>(
  F: Functor<F>,
): Birecursive<Cofree<F, A>, CofreeLayerF<F, A>> {
  return {
    functor: cofreeLayerFunctor(F),
    project: (t) => t,
    embed: (layer) => layer,
  };
}

// ============================================================================
// CofreeT
// ============================================================================

export interface CofreeT<F extends TypeFunction, W extends TypeFunction, A> {
  readonly run: $<W, CofreeLayer<F, A, CofreeT<F, W, A>>>;
}

export function cofreeTComonad<F extends TypeFunction, W extends TypeFunction>(
  F: Functor<F>,
  W: Comonad<W>,
): Comonad<CofreeTF<F, W>> {
  const map = <A, B>(wa: CofreeT<F, W, A>, f: (a: A) => B): CofreeT<F, W, B> => ({
    run: W.map(
      wa.run,
      (layer: CofreeLayer<F, A, CofreeT<F, W, A>>): CofreeLayer<F, B, CofreeT<F, W, B>> => ({
        head: f(layer.head),
        tail: F.map(layer.tail, (child: CofreeT<F, W, A>) => map(child, f)),
      }),
    ),
  });
  const duplicate = <A>(wa: CofreeT<F, W, A>): CofreeT<F, W, CofreeT<F, W, A>> => ({
    run: extend(W)(
      wa.run,
      (
        focus: $<W, CofreeLayer<F, A, CofreeT<F, W, A>>>,
      ): CofreeLayer<F, CofreeT<F, W, A>, CofreeT<F, W, CofreeT<F, W, A>>> => ({
        head: { run: focus },
        tail: F.map(W.extract(focus).tail, duplicate),
      }),
    ),
  });
  return {
    map,
    extract: (wa) => W.extract(wa.run).head,
    duplicate,
  };
}
