import { describe, it, expect } from "vitest";
import rule from "./skill-name-matches-directory.js";
import { makeMarketplace, makePlugin, makeSkill, ruleContext } from "../testing/fixtures.js";

describe("skill-name-matches-directory", () => {
  it("warns when the frontmatter name differs from the directory", () => {
    const skill = makeSkill({ id: "hooks", name: "react-hooks" });
    const marketplace = makeMarketplace({ plugins: [makePlugin({ skills: [skill] })] });

    expect(rule.defaultSeverity).toBe("warn");
    expect(rule.check(ruleContext(marketplace))).toEqual([
      {
        message: 'Skill name "react-hooks" does not match its directory "hooks"',
        file: "/repo/plugins/p/skills/hooks/SKILL.md",
        line: 2,
      },
    ]);
  });

  it("leaves skills with unusable frontmatter to skill-frontmatter", () => {
    const skill = makeSkill({ id: "hooks", name: "other", frontmatter: null });
    const marketplace = makeMarketplace({ plugins: [makePlugin({ skills: [skill] })] });
    expect(rule.check(ruleContext(marketplace))).toEqual([]);
  });
});
