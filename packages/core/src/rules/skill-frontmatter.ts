import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { RuleFinding } from "../types/index.js";

class SkillFrontmatterRule extends BaseRule {
  readonly id = "skill-frontmatter";
  readonly name = "Skill frontmatter";
  readonly description =
    "SKILL.md starts with YAML frontmatter carrying a kebab-case name and a trigger description.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    return this.skillsOf(marketplace).flatMap(({ skill }) =>
      skill.frontmatterIssues.map((issue) => ({
        message: issue.message,
        file: skill.path,
        line: issue.line,
      })),
    );
  }
}

const rule = new SkillFrontmatterRule();
registry.register(rule);
export { SkillFrontmatterRule };
export default rule;
