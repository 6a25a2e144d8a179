/**
 * Type System Extensions for refold
 *
 * 1. **Higher-Kinded Types (HKT)**: type constructors as type parameters
 *    via type-level functions (`$<F, A>`, no runtime representation)
 *
 * 2. **Existential Types**: "there exists some type S" with CPS encoding,
 *    used to hide the seed type of coinductive values
 *
 * 3. **Type-Level Utilities**: equality and assertion helpers for
 *    compile-time tests
 */

// Type-Level Boolean Utilities
export type { Equal, Extends, Expect, IsNever } from "./type-utils.js";

// Higher-Kinded Types
export type { $, Kind, TypeFunction } from "./hkt.js";

// Existential Types
export { packExists, useExists, mapExists, type Exists } from "./existential.js";
