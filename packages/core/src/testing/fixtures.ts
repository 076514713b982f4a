import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { LintOptions, Marketplace, Plugin, Skill } from "../types/index.js";
import type { RuleContext } from "../rules/base.js";

/**
 * Create a temporary directory populated with `files` (relative path -> content).
 */
export function makeTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "skillbook-"));
  writeTree(root, files);
  return root;
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const full = join(root, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, "utf-8");
  }
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function skillMd(name: string, description: string, body = `# ${name}\n`): string {
  return `---\nname: ${name}\ndescription: ${description}\n---\n\n${body}`;
}

export function marketplaceJson(
  plugins: Array<Record<string, unknown>>,
  extra: Record<string, unknown> = {},
): string {
  return JSON.stringify({ name: "test-market", owner: { name: "Test Owner" }, plugins, ...extra });
}

export function makeSkill(overrides: Partial<Skill> = {}): Skill {
  const id = overrides.id ?? "sample";
  const dir = overrides.dir ?? `/repo/plugins/p/skills/${id}`;
  return {
    id,
    name: id,
    description: "Use when testing.",
    dir,
    path: `${dir}/SKILL.md`,
    frontmatter: { name: overrides.name ?? id, description: "Use when testing." },
    frontmatterIssues: [],
    hasFrontmatter: true,
    fieldLines: { name: 2, description: 3 },
    body: "",
    bodyLine: 5,
    links: [],
    structure: { headings: [], problems: [] },
    references: [],
    ...overrides,
  };
}

export function makePlugin(overrides: Partial<Plugin> = {}): Plugin {
  const name = overrides.name ?? "p";
  return {
    name,
    source: `./plugins/${name}`,
    root: `/repo/plugins/${name}`,
    remote: false,
    missing: false,
    strict: true,
    entry: { name, source: `./plugins/${name}` },
    manifestPath: `/repo/plugins/${name}/.claude-plugin/plugin.json`,
    manifest: { name },
    manifestIssues: [],
    declaredSkills: [],
    skills: [],
    ...overrides,
  };
}

export function makeMarketplace(overrides: Partial<Marketplace> = {}): Marketplace {
  return {
    root: "/repo",
    layout: "marketplace",
    manifestPath: "/repo/.claude-plugin/marketplace.json",
    manifest: { name: "test-market", owner: { name: "Test Owner" }, plugins: [] },
    manifestIssues: [],
    plugins: [],
    ...overrides,
  };
}

export function ruleContext(
  marketplace: Marketplace,
  options: Partial<Required<LintOptions>> = {},
): RuleContext {
  return { marketplace, options: { headingIncrement: true, ...options } };
}
