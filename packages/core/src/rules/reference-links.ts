import { existsSync } from "node:fs";
import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import { linkCandidates, linkSources } from "./resolve.js";
import { classifyTarget, headingSlugs } from "../markdown/index.js";
import type { Heading, RuleFinding, Skill } from "../types/index.js";

class ReferenceLinksRule extends BaseRule {
  readonly id = "reference-links";
  readonly name = "Reference links";
  readonly description =
    "Every relative path a skill or its reference files link to exists, and same-file anchors match a heading.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const { skill } of this.skillsOf(marketplace)) {
      for (const source of linkSources(skill)) {
        let slugs: Set<string> | undefined;

        for (const link of source.links) {
          const target = classifyTarget(link.target);

          if (target.type === "anchor") {
            slugs ??= headingSlugs(headingsOf(skill, source.file));
            if (target.fragment && !slugs.has(target.fragment.toLowerCase())) {
              findings.push({
                message: `Anchor "#${target.fragment}" matches no heading`,
                file: source.file,
                line: link.line,
              });
            }
            continue;
          }

          const candidates = linkCandidates(link, source.file, skill, marketplace);
          if (candidates.length === 0 || candidates.some((path) => existsSync(path))) continue;

          findings.push({
            message: `Link target "${link.target}" does not exist`,
            file: source.file,
            line: link.line,
          });
        }
      }
    }

    return findings;
  }
}

function headingsOf(skill: Skill, file: string): Heading[] {
  if (file === skill.path) return skill.structure.headings;
  const ref = skill.references.find((r) => r.absolutePath === file);
  return ref?.markdown?.structure.headings ?? [];
}

const rule = new ReferenceLinksRule();
registry.register(rule);
export { ReferenceLinksRule };
export default rule;
