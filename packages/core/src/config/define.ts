import type { SkillbookConfig } from "../types/index.js";

/**
 * Define a skillbook configuration.
 * Use this as the default export of your `skillbook.config.ts`.
 *
 * @example
 * ```ts
 * import { defineConfig } from "@skillbook/core";
 *
 * export default defineConfig({
 *   rules: {
 *     "orphan-references": "error",
 *     "skill-name-matches-directory": "off",
 *   },
 *   ignore: ["plugins/experimental"],
 * });
 * ```
 */
export function defineConfig(config: SkillbookConfig): SkillbookConfig {
  return config;
}
