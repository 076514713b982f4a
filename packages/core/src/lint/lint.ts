import { loadMarketplace } from "../loader/marketplace.js";
import type { LintReport, Marketplace, ResolvedConfig } from "../types/index.js";
import { Linter } from "./engine.js";
import type { LinterOptions } from "./engine.js";

// Register the built-in rules
import "../rules/all.js";

/**
 * Load the repository at `config.root` and lint it with the registered rules.
 */
export async function lint(
  config: ResolvedConfig,
  options: LinterOptions = {},
): Promise<{ marketplace: Marketplace; report: LintReport }> {
  const marketplace = await loadMarketplace(config.root);
  const report = new Linter(config, options).run(marketplace);
  return { marketplace, report };
}
