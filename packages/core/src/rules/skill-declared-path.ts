import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import { SKILL_FILENAME } from "../loader/paths.js";
import type { RuleFinding } from "../types/index.js";

class SkillDeclaredPathRule extends BaseRule {
  readonly id = "skill-declared-path";
  readonly name = "Declared skill paths";
  readonly description = `Skill paths listed in the marketplace point at a directory with a ${SKILL_FILENAME}.`;

  check({ marketplace }: RuleContext): RuleFinding[] {
    return marketplace.plugins.flatMap((plugin) =>
      plugin.declaredSkills
        .filter((declared) => !declared.found)
        .map((declared) => ({
          message: `Plugin "${plugin.name}" declares skill "${declared.path}" but it has no ${SKILL_FILENAME}`,
          file: this.manifestFile(marketplace),
        })),
    );
  }
}

const rule = new SkillDeclaredPathRule();
registry.register(rule);
export { SkillDeclaredPathRule };
export default rule;
