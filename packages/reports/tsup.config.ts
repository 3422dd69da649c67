import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli.ts"],
  format: ["esm"],
  dts: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  target: "node20",
  // Workspace packages export TypeScript sources; bundle them so dist runs on plain node.
  noExternal: [/^@devinfo\//],
});
