import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts", cli: "src/cli.ts" },
  format:   ["esm"],
  dts:      { entry: "src/index.ts" },
  clean:    true,
  // platform: "node" — the file-system adapters and the CLI use node:fs,
  // node:path and node:util. The schema/ directory ships beside dist/.
  platform: "node",
  target:   "node20",
});
