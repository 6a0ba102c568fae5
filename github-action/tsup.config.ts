import { defineConfig } from "tsup";

// The action runs the bundle directly, so every dependency is inlined and
// CommonJS dependencies get a `require` shim.
export default defineConfig({
  entry: {
    index: "github-action/index.ts",
  },
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "github-action/dist",
  noExternal: [/.*/],
  banner: {
    js: 'import { createRequire } from "node:module"; const require = createRequire(import.meta.url);',
  },
  dts: false,
  sourcemap: true,
  splitting: false,
  clean: true,
});
