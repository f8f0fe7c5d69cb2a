import { defineConfig } from "tsup"

export default defineConfig({
  entry: {
    index: "src/index.ts",
    scanner: "src/scanner-entry.ts",
    events: "src/events-entry.ts",
  },
  format: ["esm", "cjs"],
  dts: true,
  clean: true,
  minify: true,
  splitting: true,
})
