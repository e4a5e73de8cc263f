import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["packages/cli/src/index.ts"],
  outDir: "packages/cli/dist",
  tsconfig: "tsconfig.json",
  format: ["esm"],
  target: "node20",
  noExternal: [/^@readyscore\//],
  external: ["typescript"],
  sourcemap: true,
  clean: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
});
