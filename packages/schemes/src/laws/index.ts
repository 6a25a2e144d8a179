/**
 * Law Definitions
 *
 * Laws are data: each is a named predicate over a generated input. Run
 * them with `checkLaws` for a report or `assertLaws` in a test.
 *
 * ```typescript
 * import { roundTripLaws, assertLaws } from "@refold/schemes/laws";
 *
 * assertLaws(roundTripLaws(natBirecursive, eqNumber, natLayerEqK.liftEq(eqNumber)), {
 *   arbitrary: (i) => i,
 * });
 * ```
 *
 * @module
 */

export type {
  Law,
  LawSet,
  ProofHint,
  Arbitrary,
  LawResult,
  LawReport,
  CheckLawsOptions,
} from "./types.js";

export { functorLaws, comonadLaws, monadLaws } from "./functor.js";
export { roundTripLaws, identityFoldLaws, fusionLaws, generalizationLaws } from "./recursive.js";
export { checkLaws, assertLaws } from "./verify.js";
