import type {
  LintOptions,
  Marketplace,
  Plugin,
  RuleFinding,
  Severity,
  Skill,
} from "../types/index.js";

export type RuleContext = {
  marketplace: Marketplace;
  options: Required<LintOptions>;
};

export abstract class BaseRule {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly description: string;

  /** Severity used when the config does not name this rule. */
  readonly defaultSeverity: Exclude<Severity, "off"> = "error";

  abstract check(context: RuleContext): RuleFinding[];

  /** Skills of every loaded plugin, paired with their plugin. */
  protected skillsOf(marketplace: Marketplace): Array<{ plugin: Plugin; skill: Skill }> {
    return marketplace.plugins.flatMap((plugin) => plugin.skills.map((skill) => ({ plugin, skill })));
  }

  /** File that findings about the plugin list itself are reported against. */
  protected manifestFile(marketplace: Marketplace): string {
    return marketplace.manifestPath ?? marketplace.root;
  }
}
