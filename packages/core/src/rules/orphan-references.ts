import { resolve } from "node:path";
import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import { linkCandidates } from "./resolve.js";
import type { LinkSource } from "./resolve.js";
import { SKILL_FILENAME } from "../loader/paths.js";
import type { RuleFinding } from "../types/index.js";

class OrphanReferencesRule extends BaseRule {
  readonly id = "orphan-references";
  readonly name = "Orphan references";
  readonly description = `Every file under references/ is reachable from ${SKILL_FILENAME} through links.`;
  override readonly defaultSeverity = "warn";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const { skill } of this.skillsOf(marketplace)) {
      if (skill.references.length === 0) continue;

      const byPath = new Map(skill.references.map((ref) => [resolve(ref.absolutePath), ref]));
      const reached = new Set<string>();
      const queue: LinkSource[] = [{ file: skill.path, links: skill.links }];

      for (let source = queue.shift(); source; source = queue.shift()) {
        for (const link of source.links) {
          for (const candidate of linkCandidates(link, source.file, skill, marketplace)) {
            const path = resolve(candidate);
            const ref = byPath.get(path);
            if (!ref || reached.has(path)) continue;
            reached.add(path);
            if (ref.markdown) queue.push({ file: ref.absolutePath, links: ref.markdown.links });
          }
        }
      }

      for (const ref of skill.references) {
        if (reached.has(resolve(ref.absolutePath))) continue;
        findings.push({
          message: `Reference file "${ref.path}" is not reachable from ${SKILL_FILENAME}`,
          file: ref.absolutePath,
        });
      }
    }

    return findings;
  }
}

const rule = new OrphanReferencesRule();
registry.register(rule);
export { OrphanReferencesRule };
export default rule;
