import yaml from "js-yaml";

export type FrontmatterSplit = {
  yaml: string | null;
  body: string;
  /** 1-based line at which the body starts in the original file. */
  bodyLine: number;
  /** An opening `---` with no closing fence. */
  unterminated: boolean;
};

export type ParsedFrontmatter = {
  data: Record<string, unknown> | null;
  body: string;
  bodyLine: number;
};

export class FrontmatterError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(message);
    this.name = "FrontmatterError";
  }
}

export function normalizeNewlines(raw: string): string {
  return raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

/**
 * Split a markdown document into its YAML frontmatter and body.
 */
export function splitFrontmatter(raw: string): FrontmatterSplit {
  const text = normalizeNewlines(raw);
  const lines = text.split("\n");

  if (lines[0]?.trimEnd() !== "---") {
    return { yaml: null, body: text, bodyLine: 1, unterminated: false };
  }

  for (let i = 1; i < lines.length; i++) {
    if (lines[i]?.trimEnd() === "---") {
      return {
        yaml: lines.slice(1, i).join("\n"),
        body: lines.slice(i + 1).join("\n"),
        bodyLine: i + 2,
        unterminated: false,
      };
    }
  }

  return { yaml: null, body: text, bodyLine: 1, unterminated: true };
}

/**
 * Split and load the frontmatter. Throws {@link FrontmatterError} when the
 * block is unterminated, is not valid YAML, or is not a mapping.
 */
export function parseFrontmatter(raw: string): ParsedFrontmatter {
  const split = splitFrontmatter(raw);

  if (split.unterminated) {
    throw new FrontmatterError("Frontmatter opened with --- is never closed", 1);
  }
  if (split.yaml === null) {
    return { data: null, body: split.body, bodyLine: split.bodyLine };
  }

  let loaded: unknown;
  try {
    loaded = yaml.load(split.yaml);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      // mark.line is 0-based within the YAML block, which starts on line 2
      const line = error.mark ? error.mark.line + 2 : 1;
      throw new FrontmatterError(`Invalid YAML frontmatter: ${error.reason}`, line);
    }
    throw error;
  }

  if (loaded === undefined || loaded === null) {
    return { data: {}, body: split.body, bodyLine: split.bodyLine };
  }
  if (!isRecord(loaded)) {
    throw new FrontmatterError("Frontmatter must be a YAML mapping", 1);
  }

  return { data: loaded, body: split.body, bodyLine: split.bodyLine };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
