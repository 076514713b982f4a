import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type {
  FrontmatterIssue,
  MarkdownContent,
  ReferenceFile,
  Skill,
  SkillFrontmatter,
} from "../types/index.js";
import {
  FrontmatterError,
  extractLinks,
  parseFrontmatter,
  scanStructure,
  splitFrontmatter,
} from "../markdown/index.js";
import { parseSkillFrontmatter } from "../schema/manifest.js";
import { SkillNotFoundError } from "./errors.js";
import { listFiles } from "./fs.js";
import { REFERENCES_DIR, SKILL_FILENAME } from "./paths.js";

const FIELD = /^([A-Za-z0-9_-]+)\s*:/;

export type LoadSkillOptions = {
  /** Defaults to the directory name. */
  id?: string;
};

type FrontmatterResult = {
  data: Record<string, unknown> | null;
  frontmatter: SkillFrontmatter | null;
  issues: FrontmatterIssue[];
  hasFrontmatter: boolean;
  body: string;
  bodyLine: number;
};

/**
 * Load `<dir>/SKILL.md` and the reference files beside it.
 *
 * Broken frontmatter does not throw: it is recorded on the skill so that
 * lint can report it alongside everything else.
 */
export async function loadSkill(dir: string, options: LoadSkillOptions = {}): Promise<Skill> {
  const skillDir = resolve(dir);
  const path = join(skillDir, SKILL_FILENAME);
  if (!existsSync(path)) {
    throw new SkillNotFoundError(skillDir);
  }

  const raw = await readFile(path, "utf-8");
  const id = options.id ?? basename(skillDir);
  const fieldLines = readFieldLines(raw);
  const fm = readFrontmatter(raw, fieldLines);

  return {
    id,
    // an invalid name is not usable for lookup or matching
    name: fm.frontmatter?.name ?? id,
    description: fm.frontmatter?.description ?? stringField(fm.data, "description") ?? "",
    dir: skillDir,
    path,
    frontmatter: fm.frontmatter,
    frontmatterIssues: fm.issues,
    hasFrontmatter: fm.hasFrontmatter,
    fieldLines,
    body: fm.body,
    bodyLine: fm.bodyLine,
    ...scanMarkdown(fm.body, fm.bodyLine),
    references: await loadReferences(skillDir),
  };
}

async function loadReferences(skillDir: string): Promise<ReferenceFile[]> {
  const paths = await listFiles(join(skillDir, REFERENCES_DIR), skillDir);

  return Promise.all(
    paths.map(async (path) => {
      const absolutePath = join(skillDir, path);
      if (!path.toLowerCase().endsWith(".md")) {
        return { path, absolutePath, markdown: null };
      }
      const split = splitFrontmatter(await readFile(absolutePath, "utf-8"));
      return { path, absolutePath, markdown: scanMarkdown(split.body, split.bodyLine) };
    }),
  );
}

function scanMarkdown(body: string, firstLine: number): MarkdownContent {
  return {
    links: extractLinks(body, firstLine),
    structure: scanStructure(body, firstLine),
  };
}

function readFrontmatter(raw: string, fieldLines: Record<string, number>): FrontmatterResult {
  try {
    const parsed = parseFrontmatter(raw);
    if (parsed.data === null) {
      return {
        data: null,
        frontmatter: null,
        issues: [{ message: "Missing YAML frontmatter (name, description)", line: 1 }],
        hasFrontmatter: false,
        body: parsed.body,
        bodyLine: parsed.bodyLine,
      };
    }

    const result = parseSkillFrontmatter(parsed.data);
    return {
      data: parsed.data,
      frontmatter: result.ok ? result.value : null,
      issues: result.ok
        ? []
        : result.issues.map((message) => ({
            message: `frontmatter ${message}`,
            line: fieldLines[message.split(/[.:]/, 1)[0] ?? ""] ?? 1,
          })),
      hasFrontmatter: true,
      body: parsed.body,
      bodyLine: parsed.bodyLine,
    };
  } catch (error) {
    if (!(error instanceof FrontmatterError)) throw error;
    const split = splitFrontmatter(raw);
    return {
      data: null,
      frontmatter: null,
      issues: [{ message: error.message, line: error.line }],
      hasFrontmatter: true,
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }
}

function readFieldLines(raw: string): Record<string, number> {
  const lines = splitFrontmatter(raw).yaml?.split("\n") ?? [];
  const fields: Record<string, number> = {};
  lines.forEach((line, index) => {
    const key = FIELD.exec(line)?.[1];
    // the YAML block starts on line 2
    if (key && fields[key] === undefined) fields[key] = index + 2;
  });
  return fields;
}

function stringField(data: Record<string, unknown> | null, key: string): string | undefined {
  const value = data?.[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
