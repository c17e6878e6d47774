import { defineConfig } from "tsup";

// Actions run without node_modules, so every dependency is bundled.
export default defineConfig({
  entry: {
    index: "github-action/index.ts",
  },
  format: ["esm"],
  platform: "node",
  target: "node20",
  outDir: "github-action/dist",
  noExternal: [/.*/],
  sourcemap: false,
  splitting: false,
  clean: true,
});
