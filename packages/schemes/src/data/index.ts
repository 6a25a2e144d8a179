/**
 * Data Types Index
 *
 * Constructors and instances are exported by name; helpers whose names would
 * collide (`map`, `fold`, `getShow`, ...) are grouped under `EitherOps` and
 * `ListOps`.
 */

// ============================================================================
// Identity and environment comonads
// ============================================================================

export type { Id } from "./id.js";
export { idMonad, idComonad } from "./id.js";

export type { Env, EnvT } from "./env.js";
export { env, ask, envComonad, envT, envTComonad } from "./env.js";

// ============================================================================
// Either / ExceptT
// ============================================================================

export type { Either } from "./either.js";
export { Left, Right, isLeft, isRight, eitherMonad } from "./either.js";
export * as EitherOps from "./either.js";

export type { ExceptT } from "./except.js";
export { exceptT, throwE, exceptTMonad } from "./except.js";

// ============================================================================
// Cofree / Free
// ============================================================================

export type { Cofree, CofreeLayer, CofreeT } from "./cofree.js";
export {
  cofree,
  cofreeComonad,
  cofreeLayerFunctor,
  cofreeBirecursive,
  cofreeTComonad,
} from "./cofree.js";

export type { Free, FreeLayer, FreeT, WrapLayer } from "./free.js";
export {
  Pure,
  Wrap,
  freeMonad,
  freeLayerFunctor,
  freeBirecursive,
  freeTPure,
  freeTWrap,
  freeTMonad,
} from "./free.js";

export { constFunctor, constBirecursive } from "./const.js";

// ============================================================================
// Recursive types
// ============================================================================

export type { List, ListLayer } from "./list.js";
export {
  Nil,
  Cons,
  listLayerFunctor,
  listBirecursive,
  arrayBirecursive,
  listLayerEqK,
  listLayerOrdK,
  listLayerShowK,
} from "./list.js";
export * as ListOps from "./list.js";

export type { NonEmptyArray, NonEmptyLayer } from "./non-empty.js";
export {
  Last,
  More,
  isNonEmpty,
  nonEmptyLayerFunctor,
  nonEmptyBirecursive,
  nonEmptyLayerEqK,
  nonEmptyLayerOrdK,
  nonEmptyLayerShowK,
} from "./non-empty.js";

export type { NatLayer } from "./nat.js";
export {
  Zero,
  Succ,
  natLayerFunctor,
  natBirecursive,
  natLayerEqK,
  natLayerOrdK,
  natLayerShowK,
} from "./nat.js";

export type { Tree, TreeLayer } from "./tree.js";
export {
  Leaf,
  Branch,
  treeLayerFunctor,
  treeBirecursive,
  treeLayerEqK,
  treeLayerOrdK,
  treeLayerShowK,
} from "./tree.js";

export type { Stream } from "./stream.js";
export {
  StreamLayer,
  streamLayerFunctor,
  streamBirecursive,
  iterate,
  takeStream,
  streamIterator,
  streamLayerEqK,
  streamLayerOrdK,
  streamLayerShowK,
} from "./stream.js";
