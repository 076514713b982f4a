import type { SkillFrontmatter } from "./manifest.js";
import type { MarkdownLink, MarkdownStructure } from "./markdown.js";

export type MarkdownContent = {
  links: MarkdownLink[];
  structure: MarkdownStructure;
};

export type ReferenceFile = {
  /** POSIX path relative to the skill directory, e.g. `references/hooks.md`. */
  path: string;
  absolutePath: string;
  /** Null for files that are not markdown. */
  markdown: MarkdownContent | null;
};

export type FrontmatterIssue = {
  message: string;
  line: number;
};

export type Skill = {
  /** Directory name. */
  id: string;
  /** Frontmatter name, or the id when the frontmatter is unusable. */
  name: string;
  description: string;
  dir: string;
  path: string;
  frontmatter: SkillFrontmatter | null;
  /** Empty when the frontmatter parsed and matched the schema. */
  frontmatterIssues: FrontmatterIssue[];
  hasFrontmatter: boolean;
  /** Line of each top-level frontmatter key. */
  fieldLines: Record<string, number>;
  body: string;
  bodyLine: number;
  links: MarkdownLink[];
  structure: MarkdownStructure;
  references: ReferenceFile[];
};
