import { dirname, join, resolve } from "node:path";
import { classifyTarget } from "../markdown/index.js";
import type { MarkdownLink, Marketplace, Skill } from "../types/index.js";

export type LinkSource = {
  /** Absolute path of the markdown file the links were read from. */
  file: string;
  links: MarkdownLink[];
};

/**
 * SKILL.md followed by every markdown reference file of the skill.
 */
export function linkSources(skill: Skill): LinkSource[] {
  const sources: LinkSource[] = [{ file: skill.path, links: skill.links }];
  for (const ref of skill.references) {
    if (ref.markdown) sources.push({ file: ref.absolutePath, links: ref.markdown.links });
  }
  return sources;
}

/**
 * Candidate absolute paths a local link may point at. Empty for external
 * links, anchors and empty paths.
 *
 * Paths written as code are also tried from the skill directory, since
 * reference files commonly name siblings as `references/x.md`.
 */
export function linkCandidates(
  link: MarkdownLink,
  file: string,
  skill: Skill,
  marketplace: Marketplace,
): string[] {
  const target = classifyTarget(link.target);
  if (target.type !== "local" || target.path === "") return [];

  if (target.rooted) return [join(marketplace.root, target.path)];

  const fromFile = resolve(dirname(file), target.path);
  if (link.kind !== "code-path") return [fromFile];

  const fromSkill = resolve(skill.dir, target.path);
  return fromSkill === fromFile ? [fromFile] : [fromFile, fromSkill];
}
