import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  platform: "node",
  // Workspace packages ship TypeScript sources, so they are bundled in.
  noExternal: [/^@runnerctl\//],
  clean: true,
  sourcemap: false,
});
