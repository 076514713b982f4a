import type {
  MarketplaceManifest,
  MarketplacePluginEntry,
  PluginManifest,
  PluginSource,
} from "./manifest.js";
import type { Skill } from "./skill.js";

export type LayoutKind = "marketplace" | "plugin" | "skills";

export type DeclaredSkillPath = {
  path: string;
  absolutePath: string;
  found: boolean;
};

export type Plugin = {
  name: string;
  source: PluginSource;
  /** Absolute plugin directory; null for remote sources. */
  root: string | null;
  remote: boolean;
  /** Local source that does not resolve to a directory. */
  missing: boolean;
  strict: boolean;
  entry: MarketplacePluginEntry | null;
  manifestPath: string | null;
  manifest: PluginManifest | null;
  manifestIssues: string[];
  declaredSkills: DeclaredSkillPath[];
  skills: Skill[];
};

export type Marketplace = {
  root: string;
  layout: LayoutKind;
  /** Null for `plugin` and `skills` layouts. */
  manifestPath: string | null;
  manifest: MarketplaceManifest | null;
  manifestIssues: string[];
  plugins: Plugin[];
};
