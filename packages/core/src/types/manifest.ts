export type {
  PluginSource,
  MarketplacePluginEntry,
  MarketplaceManifest,
  PluginManifest,
  SkillFrontmatter,
} from "../schema/manifest.js";
