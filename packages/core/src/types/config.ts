import type { Severity } from "./lint.js";

export type LintOptions = {
  /** Report headings that skip a level, e.g. `#` followed by `###`. */
  headingIncrement?: boolean;
};

export type SkillbookConfig = {
  root?: string;
  rules?: Record<string, Severity>;
  ignore?: string[];
  options?: LintOptions;
};

export type ResolvedConfig = {
  root: string;
  rules: Record<string, Severity>;
  ignore: string[];
  options: Required<LintOptions>;
};

export type GeneratedFile = {
  path: string;
  content: string;
  format: "md" | "json" | "ts";
};
