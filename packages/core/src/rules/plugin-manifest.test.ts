import { describe, it, expect } from "vitest";
import rule from "./plugin-manifest.js";
import { makeMarketplace, makePlugin, ruleContext } from "../testing/fixtures.js";

describe("plugin-manifest", () => {
  it("passes a plugin whose manifest matches its entry", () => {
    const marketplace = makeMarketplace({ plugins: [makePlugin({ name: "react" })] });
    expect(rule.check(ruleContext(marketplace))).toEqual([]);
  });

  it("requires a manifest for strict plugins", () => {
    const plugin = makePlugin({ name: "react", manifestPath: null, manifest: null });
    expect(rule.check(ruleContext(makeMarketplace({ plugins: [plugin] })))).toEqual([
      {
        message: 'Plugin "react" is strict but has no .claude-plugin/plugin.json',
        file: "/repo/.claude-plugin/marketplace.json",
      },
    ]);
  });

  it("lets non-strict plugins go without a manifest", () => {
    const plugin = makePlugin({ strict: false, manifestPath: null, manifest: null });
    expect(rule.check(ruleContext(makeMarketplace({ plugins: [plugin] })))).toEqual([]);
  });

  it("reports manifest issues on the plugin manifest", () => {
    const plugin = makePlugin({
      name: "react",
      manifest: null,
      manifestIssues: ["name: is required"],
    });
    expect(rule.check(ruleContext(makeMarketplace({ plugins: [plugin] })))).toEqual([
      {
        message: "Invalid plugin manifest: name: is required",
        file: "/repo/plugins/react/.claude-plugin/plugin.json",
      },
    ]);
  });

  it("reports a name that disagrees with the marketplace entry", () => {
    const plugin = makePlugin({ name: "react", manifest: { name: "reactjs" } });
    expect(rule.check(ruleContext(makeMarketplace({ plugins: [plugin] })))).toEqual([
      {
        message: 'Plugin manifest name "reactjs" does not match marketplace entry "react"',
        file: "/repo/plugins/react/.claude-plugin/plugin.json",
      },
    ]);
  });

  it("skips missing and remote plugins", () => {
    const plugins = [
      makePlugin({ name: "gone", missing: true, manifestPath: null, manifest: null }),
      makePlugin({ name: "far", remote: true, root: null, manifestPath: null, manifest: null }),
    ];
    expect(rule.check(ruleContext(makeMarketplace({ plugins })))).toEqual([]);
  });
});
