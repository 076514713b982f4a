import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import yaml from "js-yaml";
import type { GeneratedFile } from "../types/index.js";
import { parseSkillFrontmatter } from "../schema/manifest.js";
import { REFERENCES_DIR, SKILLS_DIR, SKILL_FILENAME } from "../loader/paths.js";

export type ScaffoldSkillOptions = {
  name: string;
  description: string;
  withReferences?: boolean;
};

export type WriteFilesOptions = {
  overwrite?: boolean;
};

export class ScaffoldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScaffoldError";
  }
}

const OVERVIEW_FILE = `${REFERENCES_DIR}/overview.md`;

/**
 * Files for a new skill, relative to the plugin root.
 */
export function scaffoldSkill(options: ScaffoldSkillOptions): GeneratedFile[] {
  const result = parseSkillFrontmatter({ name: options.name, description: options.description });
  if (!result.ok) {
    throw new ScaffoldError(`Cannot create skill "${options.name}": ${result.issues.join("; ")}`);
  }

  const { name, description } = result.value;
  const title = titleCase(name);
  const dir = `${SKILLS_DIR}/${name}`;

  let md = "---\n";
  md += yaml.dump({ name, description }, { lineWidth: -1 });
  md += "---\n\n";
  md += `# ${title}\n\n`;
  md += "## When to use\n\n";
  md += "Describe the situations this skill applies to.\n\n";
  md += "## Guidelines\n\n";
  md += "- Write each rule as a short, checkable statement.\n";
  if (options.withReferences) {
    md += "\n## References\n\n";
    md += `- [Overview](${OVERVIEW_FILE}): background that does not fit here\n`;
  }

  const files: GeneratedFile[] = [{ path: `${dir}/${SKILL_FILENAME}`, content: md, format: "md" }];

  if (options.withReferences) {
    files.push({
      path: `${dir}/${OVERVIEW_FILE}`,
      content: `# ${title}: overview\n\nDetail that is too long for ${SKILL_FILENAME}.\n`,
      format: "md",
    });
  }

  return files;
}

/**
 * Write generated files below `cwd`. Nothing is written if any target exists,
 * unless `overwrite` is set.
 */
export async function writeFiles(
  files: GeneratedFile[],
  cwd: string = process.cwd(),
  options: WriteFilesOptions = {},
): Promise<string[]> {
  const targets = files.map((file) => ({ file, fullPath: resolve(cwd, file.path) }));

  if (!options.overwrite) {
    const existing = targets.find((t) => existsSync(t.fullPath));
    if (existing) {
      throw new ScaffoldError(`${existing.file.path} already exists (use --force to overwrite)`);
    }
  }

  for (const { file, fullPath } of targets) {
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, file.content, "utf-8");
  }

  return targets.map((t) => t.fullPath);
}

export function titleCase(name: string): string {
  return name
    .split("-")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
