import { afterEach, describe, it, expect } from "vitest";
import { join, resolve } from "node:path";
import {
  ConfigNotFoundError,
  ConfigValidationError,
  findConfigFile,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./loader.js";
import { makeTree, removeTree } from "../testing/fixtures.js";

describe("validateConfig", () => {
  it("accepts a complete config", () => {
    const config = {
      root: "./skills-repo",
      rules: { "orphan-references": "error", "skill-name-matches-directory": "off" },
      ignore: ["plugins/legacy"],
      options: { headingIncrement: false },
    };
    expect(validateConfig(config)).toEqual(config);
  });

  it("accepts an empty object", () => {
    expect(validateConfig({})).toEqual({});
  });

  it("rejects non-objects", () => {
    expect(() => validateConfig("rules")).toThrow(ConfigValidationError);
    expect(() => validateConfig(null)).toThrow("Config must export an object.");
  });

  it("rejects unknown severities", () => {
    expect(() => validateConfig({ rules: { "reference-links": "fatal" } })).toThrow(
      'Rule "reference-links" has severity "fatal"; expected one of error, warn, off',
    );
  });

  it("rejects a non-string ignore entry", () => {
    expect(() => validateConfig({ ignore: ["ok", 3] })).toThrow("`ignore` must be an array of paths");
  });

  it("rejects a non-boolean headingIncrement", () => {
    expect(() => validateConfig({ options: { headingIncrement: "yes" } })).toThrow(
      "`options.headingIncrement` must be a boolean",
    );
  });
});

describe("resolveConfig", () => {
  it("fills defaults", () => {
    expect(resolveConfig({}, {}, "/work")).toEqual({
      root: resolve("/work"),
      rules: {},
      ignore: [],
      options: { headingIncrement: true },
    });
  });

  it("lets overrides win and merges rules and ignore lists", () => {
    const resolved = resolveConfig(
      {
        root: "repo",
        rules: { a: "warn", b: "error" },
        ignore: ["x"],
        options: { headingIncrement: false },
      },
      { root: "/elsewhere", rules: { b: "off" }, ignore: ["y"] },
      "/work",
    );
    expect(resolved).toEqual({
      root: resolve("/elsewhere"),
      rules: { a: "warn", b: "off" },
      ignore: ["x", "y"],
      options: { headingIncrement: false },
    });
  });
});

describe("loadConfig", () => {
  let dir = "";

  afterEach(() => {
    if (dir) removeTree(dir);
    dir = "";
  });

  it("finds the first config file name that exists", () => {
    dir = makeTree({ "skillbook.config.mjs": "export default {};\n" });
    expect(findConfigFile(dir)).toBe(join(dir, "skillbook.config.mjs"));
    expect(findConfigFile(join(dir, "nope"))).toBeNull();
  });

  it("loads the default export and resolves root beside the file", async () => {
    dir = makeTree({
      "skillbook.config.mjs":
        'export default { root: "./repo", rules: { "orphan-references": "off" } };\n',
    });
    const config = await loadConfig(undefined, dir);
    expect(config).toEqual({
      root: join(dir, "repo"),
      rules: { "orphan-references": "off" },
    });
  });

  it("throws when no config file exists", async () => {
    dir = makeTree({});
    await expect(loadConfig(undefined, dir)).rejects.toBeInstanceOf(ConfigNotFoundError);
    await expect(loadConfig("missing.config.mjs", dir)).rejects.toThrow(
      "No skillbook config found. Searched in: " + join(dir, "missing.config.mjs"),
    );
  });
});
