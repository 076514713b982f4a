export {
  splitFrontmatter,
  parseFrontmatter,
  normalizeNewlines,
  isRecord,
  FrontmatterError,
} from "./frontmatter.js";
export type { FrontmatterSplit, ParsedFrontmatter } from "./frontmatter.js";
export { extractLinks, classifyTarget } from "./links.js";
export type { TargetKind } from "./links.js";
export { scanStructure } from "./structure.js";
export { walkProse } from "./lines.js";
export type { OpenFence, LineVisitor } from "./lines.js";
export { slugify, headingSlugs } from "./slug.js";
