import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import { PLUGIN_MANIFEST_PATH } from "../loader/paths.js";
import type { RuleFinding } from "../types/index.js";

class PluginManifestRule extends BaseRule {
  readonly id = "plugin-manifest";
  readonly name = "Plugin manifest";
  readonly description =
    "Plugin manifests are valid, present for strict plugins, and agree with the marketplace entry.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const plugin of marketplace.plugins) {
      if (plugin.remote || plugin.missing) continue;

      const manifestPath = plugin.manifestPath;
      if (!manifestPath) {
        if (plugin.strict && plugin.entry) {
          findings.push({
            message: `Plugin "${plugin.name}" is strict but has no ${PLUGIN_MANIFEST_PATH}`,
            file: this.manifestFile(marketplace),
          });
        }
        continue;
      }

      for (const issue of plugin.manifestIssues) {
        findings.push({ message: `Invalid plugin manifest: ${issue}`, file: manifestPath });
      }

      if (plugin.manifest && plugin.entry && plugin.manifest.name !== plugin.entry.name) {
        findings.push({
          message: `Plugin manifest name "${plugin.manifest.name}" does not match marketplace entry "${plugin.entry.name}"`,
          file: manifestPath,
        });
      }
    }

    return findings;
  }
}

const rule = new PluginManifestRule();
registry.register(rule);
export { PluginManifestRule };
export default rule;
