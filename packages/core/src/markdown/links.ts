import type { MarkdownLink } from "../types/index.js";
import { walkProse } from "./lines.js";

const TITLE = String.raw`(?:"[^"]*"|'[^']*'|\([^)]*\))`;
const DEFINITION = new RegExp(
  String.raw`^ {0,3}\[([^\]]+)\]:\s*(?:<([^<>\n]*)>|([^\s<>]+))(?:\s+${TITLE})?\s*$`,
);
const CODE_SPAN = /(`+)(.+?)\1(?!`)/g;
const INLINE_LINK = new RegExp(
  String.raw`(!?)\[([^\]]*)\]\(\s*(?:<([^<>\n]*)>|([^\s()<>]+))(?:\s+${TITLE})?\s*\)`,
  "g",
);
const AUTOLINK = /<([a-z][a-z0-9+.-]*:[^\s<>]+)>/gi;

/** `references/x.md`, `./x.md`, `../x/y.md`: a relative markdown path written as code. */
const CODE_PATH = /^(?:\.{1,2}|references)\/(?:[\w.-]+\/)*[\w.-]+\.md(?:#[\w-]*)?$/;

export type TargetKind =
  | { type: "external" }
  | { type: "anchor"; fragment: string }
  | { type: "local"; path: string; rooted: boolean; fragment?: string };

/**
 * Collect every link a markdown body points at. Fenced code is skipped.
 * Inline code counts only when its whole content is a relative `.md` path.
 */
export function extractLinks(body: string, firstLine = 1): MarkdownLink[] {
  const links: MarkdownLink[] = [];

  walkProse(body, firstLine, (text, line) => {
    const definition = DEFINITION.exec(text);
    const defined = definition?.[2] ?? definition?.[3];
    if (definition?.[1] && defined) {
      links.push({ target: defined, text: definition[1], line, kind: "definition" });
      return;
    }

    const prose = text.replace(CODE_SPAN, (span: string, _ticks: string, content: string) => {
      const candidate = content.trim();
      if (CODE_PATH.test(candidate)) {
        links.push({ target: candidate, text: candidate, line, kind: "code-path" });
      }
      return " ".repeat(span.length);
    });

    for (const match of prose.matchAll(INLINE_LINK)) {
      // <...> destinations may contain spaces
      const target = match[3] ?? match[4];
      if (!target) continue;
      links.push({
        target,
        text: match[2] ?? "",
        line,
        kind: match[1] === "!" ? "image" : "inline",
      });
    }

    for (const match of prose.matchAll(AUTOLINK)) {
      const target = match[1];
      if (target) links.push({ target, text: target, line, kind: "autolink" });
    }
  });

  return links;
}

export function classifyTarget(target: string): TargetKind {
  if (/^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith("//")) {
    return { type: "external" };
  }
  if (target.startsWith("#")) {
    return { type: "anchor", fragment: target.slice(1) };
  }

  const hashIndex = target.indexOf("#");
  const fragment = hashIndex === -1 ? undefined : target.slice(hashIndex + 1);
  let path = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const queryIndex = path.indexOf("?");
  if (queryIndex !== -1) path = path.slice(0, queryIndex);

  return {
    type: "local",
    path: safeDecode(path),
    rooted: path.startsWith("/"),
    ...(fragment !== undefined ? { fragment } : {}),
  };
}

function safeDecode(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // malformed escapes are kept verbatim
    return path;
  }
}
