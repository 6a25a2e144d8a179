/**
 * The combinator catalogue
 *
 * `fold`, `unfold` and `refold` are the plain names of `cata`, `ana` and
 * `hylo`; the `g`-prefixed aliases name their generalized forms.
 */

export type {
  Algebra,
  Coalgebra,
  GAlgebra,
  GCoalgebra,
  Recursive,
  Corecursive,
  Birecursive,
} from "./recursive.js";
export { makeRecursive, makeCorecursive, makeBirecursive } from "./recursive.js";

export type { RAlgebra, CVAlgebra } from "./fold.js";
export {
  cata,
  cata as fold,
  cataA,
  gcata,
  gcata as gfold,
  para,
  gpara,
  zygo,
  gzygo,
  histo,
  ghisto,
  prepro,
  gprepro,
  zygoHistoPrepro,
} from "./fold.js";

export type { RCoalgebra, CVCoalgebra } from "./unfold.js";
export {
  ana,
  ana as unfold,
  gana,
  gana as gunfold,
  apo,
  gapo,
  futu,
  gfutu,
  postpro,
  gpostpro,
} from "./unfold.js";

export {
  hylo,
  hylo as refold,
  ghylo,
  ghylo as grefold,
  chrono,
  gchrono,
  elgot,
  coelgot,
} from "./refold.js";

export type { MendlerAlgebra, MendlerCVAlgebra } from "./mendler.js";
export { mcata, mhisto } from "./mendler.js";

export {
  distCata,
  distAna,
  distPara,
  distParaT,
  distZygo,
  distZygoT,
  distHisto,
  distGHisto,
  distFutu,
  distGFutu,
  distApo,
  distGApo,
  distGApoT,
} from "./distributive.js";

export {
  hoist,
  refix,
  toFix,
  fromFix,
  lambek,
  colambek,
  transverse,
  cotransverse,
} from "./convert.js";
