export type LinkKind = "inline" | "image" | "autolink" | "definition" | "code-path";

export type MarkdownLink = {
  target: string;
  text: string;
  /** 1-based line in the file the link was read from. */
  line: number;
  kind: LinkKind;
};

export type Heading = {
  level: number;
  text: string;
  line: number;
};

export type StructureProblem =
  | { type: "unclosed-fence"; line: number; fence: string }
  | { type: "heading-skip"; line: number; from: number; to: number };

export type MarkdownStructure = {
  headings: Heading[];
  problems: StructureProblem[];
};
