import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { MarkdownStructure, RuleFinding, StructureProblem } from "../types/index.js";

class MarkdownStructureRule extends BaseRule {
  readonly id = "markdown-structure";
  readonly name = "Markdown structure";
  readonly description =
    "Skill and reference markdown closes every code fence and does not skip heading levels.";

  check({ marketplace, options }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    const collect = (file: string, structure: MarkdownStructure): void => {
      for (const problem of structure.problems) {
        if (problem.type === "heading-skip" && !options.headingIncrement) continue;
        findings.push({ message: problemMessage(problem), file, line: problem.line });
      }
    };

    for (const { skill } of this.skillsOf(marketplace)) {
      collect(skill.path, skill.structure);
      for (const ref of skill.references) {
        if (ref.markdown) collect(ref.absolutePath, ref.markdown.structure);
      }
    }

    return findings;
  }
}

function problemMessage(problem: StructureProblem): string {
  switch (problem.type) {
    case "unclosed-fence":
      return `Code fence opened with ${problem.fence} is never closed`;
    case "heading-skip":
      return `Heading level jumps from h${problem.from} to h${problem.to}`;
  }
}

const rule = new MarkdownStructureRule();
registry.register(rule);
export { MarkdownStructureRule };
export default rule;
