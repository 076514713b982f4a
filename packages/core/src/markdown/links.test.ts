import { describe, it, expect } from "vitest";
import { classifyTarget, extractLinks } from "./links.js";

describe("extractLinks", () => {
  it("finds inline links and images with their line numbers", () => {
    const body = "Intro\n\nSee [hooks](references/hooks.md) and ![diagram](img/flow.png).";
    expect(extractLinks(body)).toEqual([
      { target: "references/hooks.md", text: "hooks", line: 3, kind: "inline" },
      { target: "img/flow.png", text: "diagram", line: 3, kind: "image" },
    ]);
  });

  it("offsets line numbers by the body start", () => {
    const links = extractLinks("[a](a.md)", 6);
    expect(links[0]?.line).toBe(6);
  });

  it("reads link titles and angle-bracket targets", () => {
    const links = extractLinks('[a](<docs/a.md> "Title") [b](b.md \'t\')');
    expect(links.map((l) => l.target)).toEqual(["docs/a.md", "b.md"]);
  });

  it("finds reference definitions and autolinks", () => {
    const body = "[guide]: ./guide.md\nVisit <https://example.test/docs>.";
    expect(extractLinks(body)).toEqual([
      { target: "./guide.md", text: "guide", line: 1, kind: "definition" },
      {
        target: "https://example.test/docs",
        text: "https://example.test/docs",
        line: 2,
        kind: "autolink",
      },
    ]);
  });

  it("reads definitions with a title", () => {
    expect(extractLinks('[guide]: ./guide.md "Guide"')).toEqual([
      { target: "./guide.md", text: "guide", line: 1, kind: "definition" },
    ]);
  });

  it("does not read prose after a bracketed label as a definition", () => {
    expect(extractLinks("[Note]: this rule is optional.")).toEqual([]);
  });

  it("keeps spaces inside angle-bracket targets", () => {
    expect(extractLinks("See [a](<references/my notes.md>).")).toEqual([
      { target: "references/my notes.md", text: "a", line: 1, kind: "inline" },
    ]);
  });

  it("treats code spans holding a relative markdown path as links", () => {
    const links = extractLinks("Read `references/testing.md` before `npm test`.");
    expect(links).toEqual([
      { target: "references/testing.md", text: "references/testing.md", line: 1, kind: "code-path" },
    ]);
  });

  it("ignores bare file names in code spans", () => {
    expect(extractLinks("Update `CHANGELOG.md` and `README.md`.")).toEqual([]);
  });

  it("ignores links inside code spans", () => {
    expect(extractLinks("Write `[x](missing.md)` literally.")).toEqual([]);
  });

  it("ignores links inside fenced code blocks", () => {
    const body = ["```md", "[x](missing.md)", "```", "[y](real.md)"].join("\n");
    expect(extractLinks(body)).toEqual([
      { target: "real.md", text: "y", line: 4, kind: "inline" },
    ]);
  });

  it("ignores links inside tilde fences", () => {
    const body = ["~~~", "[x](missing.md)", "~~~"].join("\n");
    expect(extractLinks(body)).toEqual([]);
  });
});

describe("classifyTarget", () => {
  it("classifies URLs and protocol-relative links as external", () => {
    expect(classifyTarget("https://example.test")).toEqual({ type: "external" });
    expect(classifyTarget("mailto:docs@example.test")).toEqual({ type: "external" });
    expect(classifyTarget("//cdn.example.test/x.png")).toEqual({ type: "external" });
  });

  it("classifies same-file anchors", () => {
    expect(classifyTarget("#usage")).toEqual({ type: "anchor", fragment: "usage" });
  });

  it("strips fragments and queries from local paths", () => {
    expect(classifyTarget("references/api.md#errors")).toEqual({
      type: "local",
      path: "references/api.md",
      rooted: false,
      fragment: "errors",
    });
    expect(classifyTarget("a.md?raw=1")).toEqual({ type: "local", path: "a.md", rooted: false });
  });

  it("decodes percent escapes", () => {
    expect(classifyTarget("my%20notes.md")).toEqual({
      type: "local",
      path: "my notes.md",
      rooted: false,
    });
  });

  it("keeps malformed escapes verbatim", () => {
    expect(classifyTarget("bad%zz.md")).toEqual({ type: "local", path: "bad%zz.md", rooted: false });
  });

  it("marks root-relative paths", () => {
    expect(classifyTarget("/docs/a.md")).toEqual({ type: "local", path: "/docs/a.md", rooted: true });
  });
});
