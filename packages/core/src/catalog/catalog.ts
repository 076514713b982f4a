import { basename } from "node:path";
import type { Marketplace, PluginSource, Skill } from "../types/index.js";
import { relativePath } from "../report/format.js";

export type CatalogSkill = {
  id: string;
  name: string;
  description: string;
  path: string;
  references: string[];
};

export type CatalogPlugin = {
  name: string;
  description: string | null;
  version: string | null;
  source: PluginSource;
  remote: boolean;
  skills: CatalogSkill[];
};

export type Catalog = {
  name: string;
  owner: string | null;
  layout: Marketplace["layout"];
  plugins: CatalogPlugin[];
};

/**
 * Summarise a loaded marketplace: plugins, their skills and reference files,
 * with paths relative to the marketplace root.
 */
export function buildCatalog(marketplace: Marketplace): Catalog {
  const { manifest } = marketplace;

  return {
    name: manifest?.name ?? marketplace.plugins[0]?.name ?? basename(marketplace.root),
    owner: manifest?.owner.name ?? null,
    layout: marketplace.layout,
    plugins: marketplace.plugins.map((plugin) => ({
      name: plugin.name,
      description: plugin.entry?.description ?? plugin.manifest?.description ?? null,
      version: plugin.entry?.version ?? plugin.manifest?.version ?? null,
      source: plugin.source,
      remote: plugin.remote,
      skills: plugin.skills.map((skill) => catalogSkill(marketplace.root, skill)),
    })),
  };
}

function catalogSkill(root: string, skill: Skill): CatalogSkill {
  return {
    id: skill.id,
    name: skill.name,
    description: skill.description,
    path: relativePath(root, skill.path),
    references: skill.references.map((ref) => ref.path),
  };
}

/**
 * Find skills by `name`, `id`, or `plugin/name`.
 */
export function findSkills(
  marketplace: Marketplace,
  query: string,
): Array<{ plugin: string; skill: Skill }> {
  const slash = query.indexOf("/");
  const pluginName = slash === -1 ? undefined : query.slice(0, slash);
  const skillName = slash === -1 ? query : query.slice(slash + 1);

  return marketplace.plugins
    .filter((plugin) => pluginName === undefined || plugin.name === pluginName)
    .flatMap((plugin) =>
      plugin.skills
        .filter((skill) => skill.name === skillName || skill.id === skillName)
        .map((skill) => ({ plugin: plugin.name, skill })),
    );
}
