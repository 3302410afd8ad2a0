import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/react.tsx"],
  dts: true,
  splitting: true,
  clean: true,
  minify: true,
  target: "node20",
  format: ["esm", "cjs"],
  external: ["react", "ws"],
  sourcemap: true,
});
