import type { Heading } from "../types/index.js";

const LINK = /!?\[([^\]]*)\](?:\([^)]*\)|\[[^\]]*\])/g;
const UNDERSCORE_EMPHASIS = /(^|[^\p{L}\p{N}])_+|_+(?=[^\p{L}\p{N}]|$)/gu;

/**
 * GitHub-style heading anchor: lowercased, punctuation dropped, spaces to hyphens.
 * Links contribute only their text, and emphasis markers are dropped.
 */
export function slugify(text: string): string {
  return text
    .replace(LINK, "$1")
    .replace(UNDERSCORE_EMPHASIS, "$1")
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/\s/g, "-");
}

/**
 * Anchors for a document's headings; repeated slugs get `-1`, `-2`, ... suffixes.
 */
export function headingSlugs(headings: Heading[]): Set<string> {
  const counts = new Map<string, number>();
  const slugs = new Set<string>();

  for (const heading of headings) {
    const base = slugify(heading.text);
    const seen = counts.get(base) ?? 0;
    slugs.add(seen === 0 ? base : `${base}-${seen}`);
    counts.set(base, seen + 1);
  }

  return slugs;
}
