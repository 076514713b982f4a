import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { basename, isAbsolute, join, resolve } from "node:path";
import type {
  DeclaredSkillPath,
  MarketplacePluginEntry,
  Plugin,
  PluginManifest,
  PluginSource,
  Skill,
} from "../types/index.js";
import { parsePluginManifest } from "../schema/manifest.js";
import { isDirectory, readJson } from "./fs.js";
import { PLUGIN_MANIFEST_PATH, SKILLS_DIR, SKILL_FILENAME } from "./paths.js";
import { loadSkill } from "./skill.js";

type PluginSeed = {
  name: string;
  source: PluginSource;
  root: string | null;
  entry: MarketplacePluginEntry | null;
  strict: boolean;
};

/**
 * Resolve a marketplace plugin source to a directory. Remote sources resolve to null.
 * Bare paths (`react`) are taken relative to `pluginRoot`; `./` and `../` paths
 * relative to the marketplace root.
 */
export function resolvePluginSource(
  source: PluginSource,
  marketplaceRoot: string,
  pluginRoot?: string,
): string | null {
  if (typeof source !== "string") return null;
  if (isAbsolute(source) || source.startsWith("./") || source.startsWith("../")) {
    return resolve(marketplaceRoot, source);
  }
  return resolve(marketplaceRoot, pluginRoot ?? ".", source);
}

/**
 * Load one plugin listed in a marketplace manifest.
 */
export async function loadPlugin(
  entry: MarketplacePluginEntry,
  marketplaceRoot: string,
  pluginRoot?: string,
): Promise<Plugin> {
  return buildPlugin({
    name: entry.name,
    source: entry.source,
    root: resolvePluginSource(entry.source, marketplaceRoot, pluginRoot),
    entry,
    strict: entry.strict ?? true,
  });
}

/**
 * Load a directory that is itself a plugin: it has a plugin manifest, or only
 * a `skills/` directory.
 */
export async function loadPluginDirectory(root: string): Promise<Plugin> {
  const dir = resolve(root);
  const hasManifest = existsSync(join(dir, PLUGIN_MANIFEST_PATH));
  const plugin = await buildPlugin({
    name: basename(dir),
    source: "./",
    root: dir,
    entry: null,
    strict: hasManifest,
  });
  return plugin.manifest ? { ...plugin, name: plugin.manifest.name } : plugin;
}

async function buildPlugin(seed: PluginSeed): Promise<Plugin> {
  const plugin: Plugin = {
    ...seed,
    remote: seed.root === null,
    missing: false,
    manifestPath: null,
    manifest: null,
    manifestIssues: [],
    declaredSkills: [],
    skills: [],
  };

  const root = seed.root;
  if (root === null) return plugin;
  if (!isDirectory(root)) return { ...plugin, missing: true };

  const manifestPath = join(root, PLUGIN_MANIFEST_PATH);
  if (existsSync(manifestPath)) {
    const { manifest, issues } = await readPluginManifest(manifestPath);
    plugin.manifestPath = manifestPath;
    plugin.manifest = manifest;
    plugin.manifestIssues = issues;
  }

  const declared = seed.entry?.skills;
  if (declared) {
    plugin.declaredSkills = declared.map((path) => declareSkill(root, path));
    plugin.skills = await Promise.all(
      plugin.declaredSkills.filter((d) => d.found).map((d) => loadSkill(d.absolutePath)),
    );
  } else {
    plugin.skills = await discoverSkills(join(root, SKILLS_DIR));
  }

  return plugin;
}

async function readPluginManifest(
  path: string,
): Promise<{ manifest: PluginManifest | null; issues: string[] }> {
  const json = await readJson(path);
  if (!json.ok) return { manifest: null, issues: [json.error] };

  const result = parsePluginManifest(json.data);
  return result.ok
    ? { manifest: result.value, issues: [] }
    : { manifest: null, issues: result.issues };
}

function declareSkill(pluginDir: string, path: string): DeclaredSkillPath {
  const absolutePath = resolve(pluginDir, path);
  return { path, absolutePath, found: existsSync(join(absolutePath, SKILL_FILENAME)) };
}

/**
 * Every directory directly under `skillsDir` that holds a SKILL.md, sorted by id.
 */
export async function discoverSkills(skillsDir: string): Promise<Skill[]> {
  if (!isDirectory(skillsDir)) return [];

  const entries = await readdir(skillsDir, { withFileTypes: true });
  const dirs = entries
    .filter((entry) => !entry.name.startsWith("."))
    .filter(
      (entry) =>
        entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(join(skillsDir, entry.name))),
    )
    .map((entry) => join(skillsDir, entry.name))
    .filter((dir) => existsSync(join(dir, SKILL_FILENAME)));

  const skills = await Promise.all(dirs.map((dir) => loadSkill(dir)));
  return skills.sort((a, b) => a.id.localeCompare(b.id));
}
