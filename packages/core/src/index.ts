export type {
  PluginSource,
  MarketplacePluginEntry,
  MarketplaceManifest,
  PluginManifest,
  SkillFrontmatter,
  LinkKind,
  MarkdownLink,
  Heading,
  StructureProblem,
  MarkdownStructure,
  MarkdownContent,
  ReferenceFile,
  FrontmatterIssue,
  Skill,
  LayoutKind,
  DeclaredSkillPath,
  Plugin,
  Marketplace,
  Severity,
  RuleFinding,
  Diagnostic,
  LintReport,
  LintOptions,
  SkillbookConfig,
  ResolvedConfig,
  GeneratedFile,
} from "./types/index.js";

export {
  parseMarketplaceManifest,
  parsePluginManifest,
  parseSkillFrontmatter,
  isKebabCase,
  SKILL_NAME_MAX,
  SKILL_DESCRIPTION_MAX,
} from "./schema/manifest.js";
export type { SchemaResult } from "./schema/manifest.js";

export {
  splitFrontmatter,
  parseFrontmatter,
  extractLinks,
  classifyTarget,
  scanStructure,
  slugify,
  headingSlugs,
  FrontmatterError,
} from "./markdown/index.js";
export type { TargetKind } from "./markdown/index.js";

export {
  detectLayout,
  loadMarketplace,
  loadPlugin,
  loadPluginDirectory,
  loadSkill,
  resolvePluginSource,
  discoverSkills,
  MarketplaceNotFoundError,
  SkillNotFoundError,
  MARKETPLACE_PATH,
  PLUGIN_MANIFEST_PATH,
  SKILLS_DIR,
  SKILL_FILENAME,
  REFERENCES_DIR,
} from "./loader/index.js";

export { BaseRule, registry } from "./rules/index.js";
export type { RuleContext } from "./rules/index.js";
export { Linter, lint, INTERNAL_RULE_ID } from "./lint/index.js";
export type { LinterOptions, RuleSource } from "./lint/index.js";
export { formatText, formatJson, relativePath } from "./report/index.js";
export type { TextFormatOptions } from "./report/index.js";
export { buildCatalog, findSkills } from "./catalog/index.js";
export type { Catalog, CatalogPlugin, CatalogSkill } from "./catalog/index.js";
export { scaffoldSkill, writeFiles, ScaffoldError } from "./scaffold/index.js";
export type { ScaffoldSkillOptions, WriteFilesOptions } from "./scaffold/index.js";
export {
  defineConfig,
  loadConfig,
  findConfigFile,
  resolveConfig,
  validateConfig,
  CONFIG_FILENAMES,
  ConfigNotFoundError,
  ConfigValidationError,
} from "./config/index.js";
