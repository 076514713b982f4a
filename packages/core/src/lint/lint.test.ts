import { afterEach, describe, it, expect } from "vitest";
import { join } from "node:path";
import { lint } from "./lint.js";
import { resolveConfig } from "../config/loader.js";
import { makeTree, marketplaceJson, removeTree, skillMd } from "../testing/fixtures.js";

describe("lint", () => {
  let root = "";

  afterEach(() => {
    if (root) removeTree(root);
    root = "";
  });

  it("passes a well-formed marketplace", async () => {
    root = makeTree({
      ".claude-plugin/marketplace.json": marketplaceJson([
        { name: "react", source: "./plugins/react" },
      ]),
      "plugins/react/.claude-plugin/plugin.json": JSON.stringify({ name: "react" }),
      "plugins/react/skills/react-hooks/SKILL.md": skillMd(
        "react-hooks",
        "Use when writing hooks.",
        "# React hooks\n\n## Rules\n\nDetails in [rules](references/rules.md).\n",
      ),
      "plugins/react/skills/react-hooks/references/rules.md": "# Rules\n",
    });

    const { marketplace, report } = await lint(resolveConfig({ root }));

    expect(marketplace.plugins[0]?.skills).toHaveLength(1);
    expect(report.diagnostics).toEqual([]);
    expect(report.ruleCount).toBe(11);
    expect(report.ok).toBe(true);
  });

  it("collects problems from several rules at once", async () => {
    root = makeTree({
      ".claude-plugin/marketplace.json": marketplaceJson([
        { name: "react", source: "./plugins/react" },
        { name: "ghost", source: "./plugins/ghost" },
      ]),
      "plugins/react/skills/hooks/SKILL.md": skillMd("react-hooks", "Use for hooks.", "# Hooks\n"),
      "plugins/react/skills/hooks/references/extra.md": "# Extra\n",
    });

    const { report } = await lint(resolveConfig({ root }));

    expect(report.diagnostics.map((d) => [d.ruleId, d.severity])).toEqual([
      ["plugin-manifest", "error"],
      ["plugin-source", "error"],
      ["skill-name-matches-directory", "warn"],
      ["orphan-references", "warn"],
    ]);
    expect(report.diagnostics[2]?.file).toBe(join(root, "plugins/react/skills/hooks/SKILL.md"));
    expect(report.errorCount).toBe(2);
    expect(report.warningCount).toBe(2);
  });

  it("honours rule severities from the config", async () => {
    root = makeTree({
      "skills/hooks/SKILL.md": skillMd("react-hooks", "Use for hooks."),
    });

    const { report } = await lint(
      resolveConfig({ root, rules: { "skill-name-matches-directory": "error" } }),
    );

    expect(report.diagnostics).toEqual([
      {
        ruleId: "skill-name-matches-directory",
        severity: "error",
        message: 'Skill name "react-hooks" does not match its directory "hooks"',
        file: join(root, "skills/hooks/SKILL.md"),
        line: 2,
      },
    ]);
  });
});
