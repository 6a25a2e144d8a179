/**
 * Law Definition Types
 *
 * A law is a predicate that must hold for every input. Every law in this
 * package takes a single generated input; functions a law quantifies over
 * (the `f` and `g` of functor composition, an algebra) are fixed when the
 * law set is built.
 *
 * @example
 * ```typescript
 * const laws = roundTripLaws(listBirecursive<number>(), eqList, eqLayer);
 * assertLaws(laws, { arbitrary: (i) => fromArray(Array.from({ length: i % 8 }, (_, j) => j)) });
 * ```
 *
 * @module
 */

// ============================================================================
// Proof Hints
// ============================================================================

/**
 * Which equation a law instantiates. Informational only: used to group
 * reports.
 */
export type ProofHint =
  | "identity-left"
  | "identity-right"
  | "associativity"
  | "composition"
  | "naturality"
  | "round-trip"
  | "fusion"
  | "specialization";

// ============================================================================
// Core Law Type
// ============================================================================

export interface Law<Args extends readonly unknown[] = readonly unknown[]> {
  /**
   * Human-readable name, used in reports and `LawViolationError` messages.
   * @example "identity", "embed after project"
   */
  readonly name: string;

  readonly check: (...args: Args) => boolean;

  /**
   * Number of generated values the law needs.
   */
  readonly arity: Args["length"];

  readonly proofHint?: ProofHint;

  /**
   * The equation in plain notation.
   */
  readonly description?: string;
}

/**
 * Laws over a single generated input of type `A`.
 */
export type LawSet<A> = readonly Law<readonly [A]>[];

// ============================================================================
// Arbitrary
// ============================================================================

/**
 * Test value generator. Receives the iteration number, so a generator may
 * be deterministic (sizes that grow with `iteration`) or random.
 */
export interface Arbitrary<A> {
  readonly arbitrary: (iteration: number) => A;
}

// ============================================================================
// Verification results
// ============================================================================

export type LawResult<A> =
  | { readonly law: string; readonly status: "passed"; readonly iterations: number }
  | {
      readonly law: string;
      readonly status: "failed";
      readonly iteration: number;
      readonly counterexample: A;
    };

export interface LawReport<A> {
  readonly passed: boolean;
  readonly iterations: number;
  readonly results: readonly LawResult<A>[];
}

export interface CheckLawsOptions {
  /**
   * Inputs to generate per law. Defaults to `laws.iterations` from config.
   */
  readonly iterations?: number;
}
