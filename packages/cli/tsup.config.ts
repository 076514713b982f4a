import { defineConfig } from "tsup";
import { readFileSync } from "node:fs";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync("./package.json", "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0-dev";
}

const version = readVersion();

export default defineConfig([
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: true,
    clean: true,
    sourcemap: true,
    target: "node20",
    outDir: "dist",
    splitting: false,
    treeshake: true,
    define: {
      PKG_VERSION: JSON.stringify(version),
    },
  },
  {
    entry: ["src/cli/bin.ts"],
    format: ["esm"],
    dts: false,
    clean: false,
    sourcemap: true,
    target: "node20",
    outDir: "dist/cli",
    splitting: false,
    treeshake: true,
    banner: {
      js: "#!/usr/bin/env node",
    },
    define: {
      PKG_VERSION: JSON.stringify(version),
    },
  },
]);
