import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { RuleFinding } from "../types/index.js";

class SkillNameMatchesDirectoryRule extends BaseRule {
  readonly id = "skill-name-matches-directory";
  readonly name = "Skill name matches directory";
  readonly description = "A skill's frontmatter name equals the name of its directory.";
  override readonly defaultSeverity = "warn";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const { skill } of this.skillsOf(marketplace)) {
      if (!skill.frontmatter || skill.frontmatter.name === skill.id) continue;
      findings.push({
        message: `Skill name "${skill.frontmatter.name}" does not match its directory "${skill.id}"`,
        file: skill.path,
        line: skill.fieldLines.name ?? 1,
      });
    }

    return findings;
  }
}

const rule = new SkillNameMatchesDirectoryRule();
registry.register(rule);
export { SkillNameMatchesDirectoryRule };
export default rule;
