import { describe, it, expect } from "vitest";
import rule from "./marketplace-manifest.js";
import { makeMarketplace, ruleContext } from "../testing/fixtures.js";

const FILE = "/repo/.claude-plugin/marketplace.json";

describe("marketplace-manifest", () => {
  it("passes a valid manifest that lists plugins", () => {
    const marketplace = makeMarketplace({
      manifest: {
        name: "test-market",
        owner: { name: "Test Owner" },
        plugins: [{ name: "p", source: "./p" }],
      },
    });
    expect(rule.check(ruleContext(marketplace))).toEqual([]);
  });

  it("reports each manifest issue", () => {
    const marketplace = makeMarketplace({
      manifest: null,
      manifestIssues: ["owner: Required", "name: is required"],
    });
    expect(rule.check(ruleContext(marketplace))).toEqual([
      { message: "Invalid marketplace manifest: owner: Required", file: FILE },
      { message: "Invalid marketplace manifest: name: is required", file: FILE },
    ]);
  });

  it("reports an empty plugin list", () => {
    expect(rule.check(ruleContext(makeMarketplace()))).toEqual([
      { message: "Marketplace lists no plugins", file: FILE },
    ]);
  });

  it("has nothing to say about repositories without a marketplace manifest", () => {
    const marketplace = makeMarketplace({ layout: "plugin", manifestPath: null, manifest: null });
    expect(rule.check(ruleContext(marketplace))).toEqual([]);
  });
});
