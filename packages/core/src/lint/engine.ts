import { relative } from "node:path";
import type {
  Diagnostic,
  LintReport,
  Marketplace,
  ResolvedConfig,
  Severity,
} from "../types/index.js";
import type { BaseRule } from "../rules/base.js";
import { registry } from "../rules/registry.js";
import { toPosix } from "../loader/fs.js";

export type RuleSource = {
  getAll(): BaseRule[];
};

export type LinterOptions = {
  /** Rules to run. Defaults to the global registry. */
  rules?: RuleSource;
  /** Called after each rule with its wall time in milliseconds. */
  onRuleComplete?: (ruleId: string, durationMs: number, findings: number) => void;
};

export const INTERNAL_RULE_ID = "internal";

/**
 * Runs registered rules over a loaded marketplace and collects a report.
 */
export class Linter {
  private rules: RuleSource;

  constructor(
    private config: ResolvedConfig,
    private options: LinterOptions = {},
  ) {
    this.rules = options.rules ?? registry;
  }

  severityOf(rule: BaseRule): Severity {
    return this.config.rules[rule.id] ?? rule.defaultSeverity;
  }

  run(marketplace: Marketplace): LintReport {
    const diagnostics: Diagnostic[] = [];
    let ruleCount = 0;

    for (const rule of this.rules.getAll()) {
      const severity = this.severityOf(rule);
      if (severity === "off") continue;
      ruleCount++;

      const startedAt = performance.now();
      try {
        const findings = rule.check({ marketplace, options: this.config.options });
        for (const finding of findings) {
          if (this.isIgnored(marketplace.root, finding.file)) continue;
          diagnostics.push({ ...finding, ruleId: rule.id, severity });
        }
        this.options.onRuleComplete?.(rule.id, performance.now() - startedAt, findings.length);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        diagnostics.push({
          ruleId: INTERNAL_RULE_ID,
          severity: "error",
          message: `Rule "${rule.id}" failed: ${message}`,
          file: marketplace.root,
        });
      }
    }

    diagnostics.sort(compareDiagnostics);
    const errorCount = diagnostics.filter((d) => d.severity === "error").length;
    const warningCount = diagnostics.length - errorCount;

    return {
      root: marketplace.root,
      diagnostics,
      errorCount,
      warningCount,
      ruleCount,
      ok: errorCount === 0,
    };
  }

  private isIgnored(root: string, file: string): boolean {
    const path = toPosix(relative(root, file));
    return this.config.ignore.some((pattern) => {
      const prefix = pattern.replace(/^\.\//, "").replace(/\/+$/, "");
      return prefix !== "" && (path === prefix || path.startsWith(`${prefix}/`));
    });
  }
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  const lineDelta = (a.line ?? 0) - (b.line ?? 0);
  if (lineDelta !== 0) return lineDelta;
  return a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0;
}
