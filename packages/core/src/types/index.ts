export type {
  PluginSource,
  MarketplacePluginEntry,
  MarketplaceManifest,
  PluginManifest,
  SkillFrontmatter,
} from "./manifest.js";
export type {
  LinkKind,
  MarkdownLink,
  Heading,
  StructureProblem,
  MarkdownStructure,
} from "./markdown.js";
export type { MarkdownContent, ReferenceFile, FrontmatterIssue, Skill } from "./skill.js";
export type { LayoutKind, DeclaredSkillPath, Plugin, Marketplace } from "./marketplace.js";
export type { Severity, RuleFinding, Diagnostic, LintReport } from "./lint.js";
export type { LintOptions, SkillbookConfig, ResolvedConfig, GeneratedFile } from "./config.js";
