import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Bundle the workspace packages, which are published as TypeScript sources
  noExternal: [/^@othello-lab\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
