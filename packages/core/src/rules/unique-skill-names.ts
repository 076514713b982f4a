import { relative } from "node:path";
import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import { toPosix } from "../loader/fs.js";
import type { RuleFinding, Skill } from "../types/index.js";

class UniqueSkillNamesRule extends BaseRule {
  readonly id = "unique-skill-names";
  readonly name = "Unique skill names";
  readonly description = "No two skills in the same plugin share a name.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const plugin of marketplace.plugins) {
      const first = new Map<string, Skill>();

      for (const skill of plugin.skills) {
        const owner = first.get(skill.name);
        if (!owner) {
          first.set(skill.name, skill);
          continue;
        }
        const ownerPath = toPosix(relative(marketplace.root, owner.path));
        findings.push({
          message: `Skill name "${skill.name}" is already used by ${ownerPath} in plugin "${plugin.name}"`,
          file: skill.path,
          line: skill.fieldLines.name ?? 1,
        });
      }
    }

    return findings;
  }
}

const rule = new UniqueSkillNamesRule();
registry.register(rule);
export { UniqueSkillNamesRule };
export default rule;
