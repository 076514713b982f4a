import { afterEach, describe, it, expect } from "vitest";
import { join } from "node:path";
import rule from "./orphan-references.js";
import { loadMarketplace } from "../loader/index.js";
import { makeTree, removeTree, ruleContext, skillMd } from "../testing/fixtures.js";

describe("orphan-references", () => {
  let root = "";

  afterEach(() => {
    if (root) removeTree(root);
    root = "";
  });

  async function check(files: Record<string, string>) {
    root = makeTree(files);
    return rule.check(ruleContext(await loadMarketplace(root)));
  }

  it("warns about reference files nothing links to", async () => {
    const findings = await check({
      "skills/api/SKILL.md": skillMd("api", "Use for APIs.", "See [errors](references/errors.md).\n"),
      "skills/api/references/errors.md": "# Errors\n",
      "skills/api/references/unused.md": "# Unused\n",
    });

    expect(rule.defaultSeverity).toBe("warn");
    expect(findings).toEqual([
      {
        message: 'Reference file "references/unused.md" is not reachable from SKILL.md',
        file: join(root, "skills/api/references/unused.md"),
      },
    ]);
  });

  it("counts links from other reference files and code paths", async () => {
    const findings = await check({
      "skills/api/SKILL.md": skillMd("api", "Use for APIs.", "Start with `references/index.md`.\n"),
      "skills/api/references/index.md": "- [Auth](auth.md)\n- ![flow](flow.png)\n",
      "skills/api/references/auth.md": "# Auth\n",
      "skills/api/references/flow.png": "png",
    });
    expect(findings).toEqual([]);
  });

  it("does not count a file linking to itself", async () => {
    const findings = await check({
      "skills/api/SKILL.md": skillMd("api", "Use for APIs."),
      "skills/api/references/loop.md": "[me](loop.md)\n",
    });
    expect(findings.map((f) => f.message)).toEqual([
      'Reference file "references/loop.md" is not reachable from SKILL.md',
    ]);
  });

  it("warns about reference files that only link to each other", async () => {
    const findings = await check({
      "skills/api/SKILL.md": skillMd("api", "Use for APIs.", "See [auth](references/auth.md).\n"),
      "skills/api/references/auth.md": "# Auth\n",
      "skills/api/references/x.md": "[y](y.md)\n",
      "skills/api/references/y.md": "[x](x.md)\n",
    });
    expect(findings.map((f) => f.message)).toEqual([
      'Reference file "references/x.md" is not reachable from SKILL.md',
      'Reference file "references/y.md" is not reachable from SKILL.md',
    ]);
  });
});
