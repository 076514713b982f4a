import { pathToFileURL } from "node:url";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ResolvedConfig, Severity, SkillbookConfig } from "../types/index.js";
import { isRecord } from "../markdown/frontmatter.js";

export const CONFIG_FILENAMES = [
  "skillbook.config.ts",
  "skillbook.config.js",
  "skillbook.config.mjs",
  "skillbook.config.mts",
];

const SEVERITIES: readonly Severity[] = ["error", "warn", "off"];

/**
 * Find the skillbook config file in the given directory.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of CONFIG_FILENAMES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

/**
 * Load a skillbook config from a file path, or from the first config file
 * found in `cwd`.
 *
 * TypeScript config files need a runtime that loads TS (tsx, or Node 22+
 * with --experimental-strip-types).
 */
export async function loadConfig(configPath?: string, cwd?: string): Promise<SkillbookConfig> {
  const resolvedPath = configPath ? resolve(cwd ?? process.cwd(), configPath) : findConfigFile(cwd);

  if (!resolvedPath) {
    throw new ConfigNotFoundError(cwd ?? process.cwd());
  }

  if (!existsSync(resolvedPath)) {
    throw new ConfigNotFoundError(resolvedPath);
  }

  const fileUrl = pathToFileURL(resolvedPath).href;
  const mod: unknown = await import(fileUrl);
  const exported = isRecord(mod) && "default" in mod ? mod.default : mod;

  const config = validateConfig(exported);
  // a relative root is taken from the config file's directory
  return config.root ? { ...config, root: resolve(dirname(resolvedPath), config.root) } : config;
}

/**
 * Check the shape of an imported config value.
 */
export function validateConfig(value: unknown): SkillbookConfig {
  if (!isRecord(value)) {
    throw new ConfigValidationError(
      "Config must export an object. Did you forget to use `defineConfig()`?",
    );
  }

  const config: SkillbookConfig = {};

  if (value.root !== undefined) {
    if (typeof value.root !== "string") {
      throw new ConfigValidationError("`root` must be a string");
    }
    config.root = value.root;
  }

  if (value.rules !== undefined) {
    if (!isRecord(value.rules)) {
      throw new ConfigValidationError("`rules` must be an object of rule id to severity");
    }
    const rules: Record<string, Severity> = {};
    for (const [id, severity] of Object.entries(value.rules)) {
      if (!isSeverity(severity)) {
        throw new ConfigValidationError(
          `Rule "${id}" has severity ${JSON.stringify(severity)}; expected one of ${SEVERITIES.join(", ")}`,
        );
      }
      rules[id] = severity;
    }
    config.rules = rules;
  }

  if (value.ignore !== undefined) {
    if (!Array.isArray(value.ignore) || !value.ignore.every((p) => typeof p === "string")) {
      throw new ConfigValidationError("`ignore` must be an array of paths");
    }
    config.ignore = value.ignore;
  }

  if (value.options !== undefined) {
    if (!isRecord(value.options)) {
      throw new ConfigValidationError("`options` must be an object");
    }
    const { headingIncrement } = value.options;
    if (headingIncrement !== undefined && typeof headingIncrement !== "boolean") {
      throw new ConfigValidationError("`options.headingIncrement` must be a boolean");
    }
    config.options = headingIncrement === undefined ? {} : { headingIncrement };
  }

  return config;
}

/**
 * Fill in defaults. `overrides` (usually CLI flags) win over the file config.
 */
export function resolveConfig(
  config: SkillbookConfig = {},
  overrides: SkillbookConfig = {},
  cwd: string = process.cwd(),
): ResolvedConfig {
  return {
    root: resolve(cwd, overrides.root ?? config.root ?? "."),
    rules: { ...config.rules, ...overrides.rules },
    ignore: [...(config.ignore ?? []), ...(overrides.ignore ?? [])],
    options: {
      headingIncrement:
        overrides.options?.headingIncrement ?? config.options?.headingIncrement ?? true,
    },
  };
}

function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITIES.some((s) => s === value);
}

export class ConfigNotFoundError extends Error {
  constructor(searchPath: string) {
    super(
      `No skillbook config found. Searched in: ${searchPath}\n` +
        `Create a skillbook.config.ts file or run: skillbook init`,
    );
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
