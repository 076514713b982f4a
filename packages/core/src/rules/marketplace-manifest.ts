import { BaseRule } from "./base.js";
import type { RuleContext } from "./base.js";
import { registry } from "./registry.js";
import type { RuleFinding } from "../types/index.js";

class MarketplaceManifestRule extends BaseRule {
  readonly id = "marketplace-manifest";
  readonly name = "Marketplace manifest";
  readonly description = "The marketplace manifest is valid JSON and lists its plugins correctly.";

  check({ marketplace }: RuleContext): RuleFinding[] {
    const file = marketplace.manifestPath;
    if (!file) return [];

    const findings: RuleFinding[] = marketplace.manifestIssues.map((issue) => ({
      message: `Invalid marketplace manifest: ${issue}`,
      file,
    }));

    if (marketplace.manifest && marketplace.manifest.plugins.length === 0) {
      findings.push({ message: "Marketplace lists no plugins", file });
    }

    return findings;
  }
}

const rule = new MarketplaceManifestRule();
registry.register(rule);
export { MarketplaceManifestRule };
export default rule;
