import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { RuleFinding } from "../types/index.js";

class PluginSourceRule extends BaseRule {
  readonly id = "plugin-source";
  readonly name = "Plugin source";
  readonly description = "Every local plugin source resolves to a directory.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    return marketplace.plugins
      .filter((plugin) => plugin.missing)
      .map((plugin) => ({
        message: `Plugin "${plugin.name}" source ${JSON.stringify(plugin.source)} is not a directory`,
        file: this.manifestFile(marketplace),
      }));
  }
}

const rule = new PluginSourceRule();
registry.register(rule);
export { PluginSourceRule };
export default rule;
