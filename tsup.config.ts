import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — @skein/core touches no browser or Node.js specific
  // API. Cursors only walk caller-owned arrays and call caller-owned functions.
  platform: "neutral",
});
