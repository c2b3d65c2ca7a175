import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const packageJson = fileURLToPath(new URL("./package.json", import.meta.url));

// Read version from package.json at build time
const pkg: unknown = JSON.parse(readFileSync(packageJson, "utf-8"));
const pkgVersion =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0-dev";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },

  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: ["@shellmark/core", "@shellmark/shared"],

  esbuildOptions(options) {
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkgVersion),
    };
  },
});
