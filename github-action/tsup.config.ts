import { defineConfig } from "tsup";

// Actions run without node_modules, so every dependency is bundled in.
// data/ is read from the action checkout at runtime.
export default defineConfig({
  entry: {
    index: "github-action/index.ts",
  },
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "github-action/dist",
  noExternal: [/.*/],
  // Bundled CommonJS dependencies still call require() for builtins.
  banner: {
    js: "import { createRequire } from 'node:module'; const require = createRequire(import.meta.url);",
  },
  dts: false,
  sourcemap: true,
  splitting: false,
  clean: true,
});
