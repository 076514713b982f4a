import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import type { LayoutKind, Marketplace, MarketplacePluginEntry } from "../types/index.js";
import { marketplacePluginEntrySchema, parseMarketplaceManifest } from "../schema/manifest.js";
import { isRecord } from "../markdown/index.js";
import { MarketplaceNotFoundError } from "./errors.js";
import { isDirectory, readJson } from "./fs.js";
import { MARKETPLACE_PATH, PLUGIN_MANIFEST_PATH, SKILLS_DIR } from "./paths.js";
import { loadPlugin, loadPluginDirectory } from "./plugin.js";

/**
 * Work out what kind of repository `root` is.
 */
export function detectLayout(root: string): LayoutKind {
  const dir = resolve(root);
  if (existsSync(join(dir, MARKETPLACE_PATH))) return "marketplace";
  if (existsSync(join(dir, PLUGIN_MANIFEST_PATH))) return "plugin";
  if (isDirectory(join(dir, SKILLS_DIR))) return "skills";
  throw new MarketplaceNotFoundError(dir);
}

/**
 * Load a whole repository into a {@link Marketplace}.
 *
 * Only a missing repository throws. Malformed manifests and skills are
 * recorded on the returned model so lint can report every problem at once.
 */
export async function loadMarketplace(root: string): Promise<Marketplace> {
  const dir = resolve(root);
  const layout = detectLayout(dir);

  if (layout !== "marketplace") {
    return {
      root: dir,
      layout,
      manifestPath: null,
      manifest: null,
      manifestIssues: [],
      plugins: [await loadPluginDirectory(dir)],
    };
  }

  const manifestPath = join(dir, MARKETPLACE_PATH);
  const json = await readJson(manifestPath);
  if (!json.ok) {
    return {
      root: dir,
      layout,
      manifestPath,
      manifest: null,
      manifestIssues: [json.error],
      plugins: [],
    };
  }

  const result = parseMarketplaceManifest(json.data);
  const entries = result.ok ? result.value.plugins : salvageEntries(json.data);
  const pluginRoot = result.ok ? result.value.metadata?.pluginRoot : salvagePluginRoot(json.data);

  return {
    root: dir,
    layout,
    manifestPath,
    manifest: result.ok ? result.value : null,
    manifestIssues: result.ok ? [] : result.issues,
    plugins: await Promise.all(entries.map((entry) => loadPlugin(entry, dir, pluginRoot))),
  };
}

/**
 * Plugin entries that are individually valid inside an otherwise invalid manifest.
 */
function salvageEntries(data: unknown): MarketplacePluginEntry[] {
  if (!isRecord(data) || !Array.isArray(data.plugins)) return [];

  const entries: MarketplacePluginEntry[] = [];
  for (const candidate of data.plugins) {
    const parsed = marketplacePluginEntrySchema.safeParse(candidate);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}

function salvagePluginRoot(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.metadata)) return undefined;
  const value = data.metadata.pluginRoot;
  return typeof value === "string" ? value : undefined;
}
