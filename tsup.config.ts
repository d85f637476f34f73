import type { Options } from "tsup";

export const tsup: Options = {
  splitting: true,
  sourcemap: true,
  clean: true,
  dts: true,
  format: ["cjs", "esm"],
  minify: false,
  bundle: true,
  skipNodeModulesBundle: true,
  entryPoints: [
    "src/index.ts",
    "src/bplist/index.ts",
    "src/value/index.ts",
    "src/compare/index.ts",
    "src/inspect/index.ts",
    "src/shared/index.ts",
  ],
  watch: false,
  target: "node20",
  treeshake: true,
};
