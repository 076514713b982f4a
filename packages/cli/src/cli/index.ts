import * as p from "@clack/prompts";
import { join } from "node:path";
import {
  buildCatalog,
  detectLayout,
  findConfigFile,
  findSkills,
  formatJson,
  formatText,
  lint,
  loadConfig,
  loadMarketplace,
  MarketplaceNotFoundError,
  registry,
  relativePath,
  resolveConfig,
  scaffoldSkill,
  writeFiles,
} from "@skillbook/core";
import type { Marketplace, ResolvedConfig, SkillbookConfig } from "@skillbook/core";
import { askDescription, askReferences, askSkillName } from "../ui/prompts.js";

declare const PKG_VERSION: string | undefined;

const VERSION = typeof PKG_VERSION === "string" ? PKG_VERSION : "0.0.0-dev";

const HELP = `
skillbook - Validate and author skill marketplaces for AI coding assistants

USAGE:
  skillbook <command> [options]

COMMANDS:
  validate    Check manifests, skills and reference links (alias: lint)
  list        List plugins and their skills
  show        Show one skill: skillbook show <skill> or <plugin>/<skill>
  catalog     Print the marketplace catalogue as JSON
  new         Create a skill: skillbook new <name>
  init        Create a skillbook.config.ts in the current directory
  rules       List lint rules and their severities
  help        Show this help message

OPTIONS:
  --root            Repository root (default: config root or current directory)
  --config          Path to config file (default: skillbook.config.ts)
  --format          validate output: text or json (default: text)
  --max-warnings    validate fails when warnings exceed this number
  --json            list/show output as JSON
  --plugin          new: plugin to add the skill to
  --description     new: trigger description for the skill
  --references      new: also create references/overview.md
  --dry-run         Show what would be written without writing files
  --force           new: overwrite existing files
  --no-color        Disable coloured output
  --verbose         Show rule timings and the resolved config
  --version         Print the version

EXAMPLES:
  skillbook validate                       # Lint the repository in the current directory
  skillbook validate --format=json         # Machine-readable report
  skillbook list                           # Plugins and skills
  skillbook show react/hooks               # One skill in one plugin
  skillbook new api-typing --plugin=typescript --description="Use when typing OpenAPI clients."
`;

type Flags = {
  root?: string;
  config?: string;
  format?: string;
  maxWarnings?: number;
  json?: boolean;
  plugin?: string;
  description?: string;
  references?: boolean;
  dryRun?: boolean;
  force?: boolean;
  color?: boolean;
  verbose?: boolean;
};

export async function run(args: string[]): Promise<void> {
  const command = args[0];
  const { flags, positionals } = parseFlags(args.slice(1));

  switch (command) {
    case "validate":
    case "lint":
      await cmdValidate(flags);
      break;
    case "list":
      await cmdList(flags);
      break;
    case "show":
      await cmdShow(positionals, flags);
      break;
    case "catalog":
      await cmdCatalog(flags);
      break;
    case "new":
      await cmdNew(positionals, flags);
      break;
    case "init":
      await cmdInit(flags);
      break;
    case "rules":
      await cmdRules(flags);
      break;
    case "--version":
    case "-v":
      console.log(VERSION);
      break;
    case "help":
    case "--help":
    case "-h":
    case undefined:
      console.log(HELP);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      process.exit(1);
  }
}

// ── Commands ────────────────────────────────────────────────

async function cmdValidate(flags: Flags): Promise<void> {
  if (flags.format !== undefined && flags.format !== "text" && flags.format !== "json") {
    throw new Error(`Unknown format "${flags.format}" (expected text or json)`);
  }

  const config = await resolveFromFlags(flags);
  if (flags.verbose) {
    console.log(`Config: ${JSON.stringify(config)}\n`);
  }

  const { report } = await lint(config, {
    onRuleComplete: flags.verbose
      ? (ruleId, durationMs, findings) =>
          console.log(`  ${ruleId.padEnd(30)} ${durationMs.toFixed(1).padStart(7)}ms  ${findings}`)
      : undefined,
  });

  if (flags.format === "json") {
    console.log(formatJson(report));
  } else {
    console.log(formatText(report, { color: useColor(flags) }));
  }

  if (!report.ok) {
    process.exit(1);
  }
  if (flags.maxWarnings !== undefined && report.warningCount > flags.maxWarnings) {
    console.error(`Too many warnings (${report.warningCount}, max ${flags.maxWarnings})`);
    process.exit(1);
  }
}

async function cmdList(flags: Flags): Promise<void> {
  const config = await resolveFromFlags(flags);
  const catalog = buildCatalog(await loadMarketplace(config.root));

  if (flags.json) {
    console.log(JSON.stringify(catalog, null, 2));
    return;
  }

  const color = useColor(flags);
  const bold = (text: string): string => (color ? `\x1b[1m${text}\x1b[0m` : text);
  const dim = (text: string): string => (color ? `\x1b[90m${text}\x1b[0m` : text);

  console.log(`${bold(catalog.name)} ${dim(`(${catalog.layout})`)}`);

  let skillCount = 0;
  for (const plugin of catalog.plugins) {
    const version = plugin.version ? ` v${plugin.version}` : "";
    const remote = plugin.remote ? dim(" (remote)") : "";
    console.log(`\n  ${bold(plugin.name)}${version}${remote}`);
    for (const skill of plugin.skills) {
      console.log(`    - ${skill.name}  ${dim(truncate(skill.description, 80))}`);
    }
    skillCount += plugin.skills.length;
  }

  console.log(`\n${catalog.plugins.length} plugin(s), ${skillCount} skill(s)`);
}

async function cmdShow(positionals: string[], flags: Flags): Promise<void> {
  const query = positionals[0];
  if (!query) {
    throw new Error("Missing skill name: skillbook show <skill>");
  }

  const config = await resolveFromFlags(flags);
  const marketplace = await loadMarketplace(config.root);
  const matches = findSkills(marketplace, query);

  if (matches.length === 0) {
    console.error(`Skill not found: ${query}`);
    process.exit(1);
  }
  if (matches.length > 1) {
    const names = matches.map((m) => `${m.plugin}/${m.skill.name}`).join(", ");
    console.error(`"${query}" matches several skills: ${names}`);
    process.exit(1);
  }

  const match = matches[0];
  if (!match) return;
  const { plugin, skill } = match;
  const root = marketplace.root;

  if (flags.json) {
    console.log(
      JSON.stringify(
        {
          plugin,
          id: skill.id,
          name: skill.name,
          description: skill.description,
          path: relativePath(root, skill.path),
          references: skill.references.map((ref) => ref.path),
          links: skill.links.map(({ target, line, kind }) => ({ target, line, kind })),
        },
        null,
        2,
      ),
    );
    return;
  }

  console.log(`${skill.name} (${plugin})`);
  console.log(skill.description);
  console.log("");
  console.log(`path:        ${relativePath(root, skill.path)}`);
  console.log(`references:  ${skill.references.length}`);
  for (const ref of skill.references) {
    console.log(`  - ${ref.path}`);
  }
  console.log(`links:       ${skill.links.length}`);
  for (const link of skill.links) {
    console.log(`  ${String(link.line).padStart(4)}  ${link.target}`);
  }
}

async function cmdCatalog(flags: Flags): Promise<void> {
  const config = await resolveFromFlags(flags);
  const marketplace = await loadMarketplace(config.root);
  console.log(JSON.stringify(buildCatalog(marketplace), null, 2));
}

async function cmdNew(positionals: string[], flags: Flags): Promise<void> {
  const interactive = Boolean(process.stdin.isTTY);
  const config = await resolveFromFlags(flags);

  p.intro("skillbook new");

  const name = positionals[0] ?? (interactive ? await askSkillName() : undefined);
  if (!name) {
    throw new Error("Missing skill name: skillbook new <name>");
  }

  const description =
    flags.description ?? (interactive ? await askDescription(name) : undefined);
  if (!description) {
    throw new Error('Missing description: skillbook new <name> --description="Use when ..."');
  }

  const withReferences = flags.references ?? (interactive ? await askReferences() : false);
  const pluginDir = await resolvePluginDir(config, flags.plugin);
  const files = scaffoldSkill({ name, description, withReferences });

  if (flags.dryRun) {
    for (const file of files) {
      p.log.info(`[dry-run] Would write: ${relativePath(config.root, join(pluginDir, file.path))}`);
    }
    p.outro("Nothing written.");
    return;
  }

  const written = await writeFiles(files, pluginDir, { overwrite: flags.force });
  for (const path of written) {
    p.log.success(`Created ${relativePath(config.root, path)}`);
  }
  p.outro(`Run: skillbook validate`);
}

async function cmdInit(flags: Flags): Promise<void> {
  const { existsSync } = await import("node:fs");
  if (existsSync("skillbook.config.ts")) {
    console.log("Config already exists: skillbook.config.ts");
    return;
  }

  const { writeFile } = await import("node:fs/promises");

  const template = `import { defineConfig } from "@skillbook/core";

export default defineConfig({
  // Severity per rule: "error", "warn" or "off".
  // Run \`skillbook rules\` to see every rule.
  rules: {
    // "orphan-references": "error",
  },
  // Path prefixes (relative to the repository root) whose problems are not reported.
  ignore: [],
});
`;

  if (flags.dryRun) {
    console.log("[dry-run] Would create skillbook.config.ts");
    return;
  }

  await writeFile("skillbook.config.ts", template, "utf-8");
  console.log("Created skillbook.config.ts");
  console.log("");
  console.log("Next steps:");
  console.log("  1. Edit skillbook.config.ts to tune rule severities");
  console.log("  2. Run: skillbook validate");
}

async function cmdRules(flags: Flags): Promise<void> {
  const config = await resolveFromFlags(flags);

  for (const rule of registry.getAll()) {
    const severity = config.rules[rule.id] ?? rule.defaultSeverity;
    console.log(`  ${rule.id.padEnd(30)} ${severity.padEnd(5)}  ${rule.description}`);
  }

  console.log(`\n${registry.list().length} rules`);
}

// ── Helpers ─────────────────────────────────────────────────

function parseFlags(args: string[]): { flags: Flags; positionals: string[] } {
  const flags: Flags = {};
  const positionals: string[] = [];

  for (const arg of args) {
    if (arg.startsWith("--root=")) {
      flags.root = arg.slice(7);
    } else if (arg.startsWith("--config=")) {
      flags.config = arg.slice(9);
    } else if (arg.startsWith("--format=")) {
      flags.format = arg.slice(9);
    } else if (arg.startsWith("--max-warnings=")) {
      const value = Number(arg.slice(15));
      if (!Number.isInteger(value) || value < 0) {
        throw new Error(`--max-warnings expects a non-negative integer, got "${arg.slice(15)}"`);
      }
      flags.maxWarnings = value;
    } else if (arg.startsWith("--plugin=")) {
      flags.plugin = arg.slice(9);
    } else if (arg.startsWith("--description=")) {
      flags.description = arg.slice(14);
    } else if (arg === "--json") {
      flags.json = true;
    } else if (arg === "--references") {
      flags.references = true;
    } else if (arg === "--dry-run") {
      flags.dryRun = true;
    } else if (arg === "--force") {
      flags.force = true;
    } else if (arg === "--no-color") {
      flags.color = false;
    } else if (arg === "--verbose") {
      flags.verbose = true;
    } else if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }

  return { flags, positionals };
}

async function resolveFromFlags(flags: Flags): Promise<ResolvedConfig> {
  const cwd = process.cwd();
  let fileConfig: SkillbookConfig = {};

  if (flags.config) {
    fileConfig = await loadConfig(flags.config, cwd);
  } else if (findConfigFile(cwd)) {
    fileConfig = await loadConfig(undefined, cwd);
  }

  return resolveConfig(fileConfig, flags.root ? { root: flags.root } : {}, cwd);
}

/**
 * Directory of the plugin a new skill goes into. Outside a marketplace this
 * is the root itself.
 */
async function resolvePluginDir(config: ResolvedConfig, pluginName?: string): Promise<string> {
  let marketplace: Marketplace;
  try {
    if (detectLayout(config.root) !== "marketplace") return config.root;
    marketplace = await loadMarketplace(config.root);
  } catch (error) {
    if (error instanceof MarketplaceNotFoundError) return config.root;
    throw error;
  }

  const local = marketplace.plugins.filter((plugin) => plugin.root !== null && !plugin.missing);

  if (pluginName) {
    const plugin = local.find((candidate) => candidate.name === pluginName);
    if (!plugin?.root) {
      const known = local.map((candidate) => candidate.name).join(", ") || "none";
      throw new Error(`Unknown local plugin "${pluginName}" (available: ${known})`);
    }
    return plugin.root;
  }

  const only = local.length === 1 ? local[0] : undefined;
  if (!only?.root) {
    throw new Error(
      `Marketplace has ${local.length} local plugins; choose one with --plugin=<name>`,
    );
  }
  return only.root;
}

function useColor(flags: Flags): boolean {
  return flags.color ?? Boolean(process.stdout.isTTY);
}

function truncate(text: string, max: number): string {
  const line = text.replace(/\s+/g, " ").trim();
  return line.length <= max ? line : `${line.slice(0, max - 1)}…`;
}
