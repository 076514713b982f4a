import type { Heading, MarkdownStructure, StructureProblem } from "../types/index.js";
import { walkProse } from "./lines.js";

const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)[ \t]*$/;
/** Blank lines, indented code, list items and block quotes do not start a paragraph. */
const NOT_PARAGRAPH = /^(?:[ \t]*$| {4,}|\t| {0,3}(?:[-*+]|\d{1,9}[.)])(?:[ \t]|$)| {0,3}>)/;

type Paragraph = {
  text: string;
  line: number;
  lastLine: number;
};

export function scanStructure(body: string, firstLine = 1): MarkdownStructure {
  const headings: Heading[] = [];
  const problems: StructureProblem[] = [];
  let paragraph: Paragraph | null = null;

  const addHeading = (level: number, text: string, line: number): void => {
    const previous = headings[headings.length - 1];
    if (previous && level > previous.level + 1) {
      problems.push({ type: "heading-skip", line, from: previous.level, to: level });
    }
    headings.push({ level, text, line });
  };

  const unclosed = walkProse(body, firstLine, (text, line) => {
    // a fence in between breaks the paragraph
    const open = paragraph !== null && paragraph.lastLine === line - 1 ? paragraph : null;
    paragraph = null;

    const atx = ATX_HEADING.exec(text);
    const hashes = atx?.[1];
    if (atx && hashes) {
      addHeading(hashes.length, atx[2]?.trim() ?? "", line);
      return;
    }

    const underline = SETEXT_UNDERLINE.exec(text)?.[1];
    if (underline) {
      if (open) addHeading(underline.startsWith("=") ? 1 : 2, open.text, open.line);
      return;
    }

    if (NOT_PARAGRAPH.test(text)) return;
    paragraph = open
      ? { ...open, text: `${open.text} ${text.trim()}`, lastLine: line }
      : { text: text.trim(), line, lastLine: line };
  });

  if (unclosed) {
    problems.push({ type: "unclosed-fence", line: unclosed.line, fence: unclosed.marker });
  }

  return { headings, problems };
}
