// Register the built-in rules
import "./all.js";

export { BaseRule } from "./base.js";
export type { RuleContext } from "./base.js";
export { registry } from "./registry.js";
export type { RuleRegistry } from "./registry.js";
export { linkSources, linkCandidates } from "./resolve.js";
export type { LinkSource } from "./resolve.js";
