export { Fix, unfix, fixBirecursive, fixEq, fixOrd, fixShow } from "./fix.js";
export type { Mu } from "./mu.js";
export { muBirecursive, hoistMu, muEq, muOrd, muShow } from "./mu.js";
export type { NuState, NuStateF } from "./nu.js";
export { Nu, nuBirecursive, hoistNu, nuEq, nuOrd, nuShow } from "./nu.js";
