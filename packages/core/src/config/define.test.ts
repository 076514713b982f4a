import { describe, it, expect } from "vitest";
import { defineConfig } from "./define.js";
import type { SkillbookConfig } from "../types/index.js";

describe("defineConfig", () => {
  it("returns the config object unchanged", () => {
    const config: SkillbookConfig = {
      rules: { "orphan-references": "error" },
      ignore: ["plugins/experimental"],
    };
    expect(defineConfig(config)).toBe(config);
  });

  it("accepts an empty config", () => {
    expect(defineConfig({})).toEqual({});
  });
});
