export { Linter, INTERNAL_RULE_ID } from "./engine.js";
export type { LinterOptions, RuleSource } from "./engine.js";
export { lint } from "./lint.js";
