import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",

    // =========================================================================
    // Granular entry points
    // =========================================================================
    errors: "src/errors-entry.ts",
    context: "src/context-entry.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
});
