export type Severity = "error" | "warn" | "off";

export type RuleFinding = {
  message: string;
  /** Absolute path of the offending file. */
  file: string;
  line?: number;
};

export type Diagnostic = RuleFinding & {
  ruleId: string;
  severity: Exclude<Severity, "off">;
};

export type LintReport = {
  root: string;
  diagnostics: Diagnostic[];
  errorCount: number;
  warningCount: number;
  ruleCount: number;
  ok: boolean;
};
