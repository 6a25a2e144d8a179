import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    "data/index": "src/data/index.ts",
    "laws/index": "src/laws/index.ts",
    "typeclasses/index": "src/typeclasses/index.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  external: ["cosmiconfig", "@refold/type-system"],
});
