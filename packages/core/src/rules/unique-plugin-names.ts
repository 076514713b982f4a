import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { RuleFinding } from "../types/index.js";

class UniquePluginNamesRule extends BaseRule {
  readonly id = "unique-plugin-names";
  readonly name = "Unique plugin names";
  readonly description = "No two plugins in a marketplace share a name.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const firstIndex = new Map<string, number>();
    const findings: RuleFinding[] = [];

    marketplace.plugins.forEach((plugin, index) => {
      const first = firstIndex.get(plugin.name);
      if (first === undefined) {
        firstIndex.set(plugin.name, index);
        return;
      }
      findings.push({
        message: `Duplicate plugin name "${plugin.name}" (plugins[${index}] repeats plugins[${first}])`,
        file: this.manifestFile(marketplace),
      });
    });

    return findings;
  }
}

const rule = new UniquePluginNamesRule();
registry.register(rule);
export { UniquePluginNamesRule };
export default rule;
