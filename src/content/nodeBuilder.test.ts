import { describe, it, expect } from "vitest";
import type { TelegraphNode } from "@/types/telegraph";
import { appendNodes, dropBlockWhitespace, element, wrapInlineRuns } from "./nodeBuilder";

describe("appendNodes", () => {
  it("should merge adjacent text and skip empty strings", () => {
    const target: TelegraphNode[] = ["a"];

    appendNodes(target, ["b", "", { tag: "br" }, "c"]);

    expect(target).toEqual(["ab", { tag: "br" }, "c"]);
  });
});

describe("element", () => {
  it("should omit empty children", () => {
    expect(element("hr")).toEqual({ tag: "hr" });
  });
});

describe("wrapInlineRuns", () => {
  it("should group inline runs between blocks into trimmed paragraphs", () => {
    const nodes: TelegraphNode[] = [
      "  lead ",
      { tag: "b", children: ["x"] },
      { tag: "hr" },
      " \n ",
      { tag: "p", children: ["body"] },
      "tail\n",
    ];

    expect(wrapInlineRuns(nodes)).toEqual([
      { tag: "p", children: ["lead ", { tag: "b", children: ["x"] }] },
      { tag: "hr" },
      { tag: "p", children: ["body"] },
      { tag: "p", children: ["tail"] },
    ]);
  });
});

describe("dropBlockWhitespace", () => {
  it("should keep blank text between inline nodes only", () => {
    const nodes: TelegraphNode[] = [" ", { tag: "b" }, " ", { tag: "i" }, " ", { tag: "p" }, " "];

    expect(dropBlockWhitespace(nodes)).toEqual([" ", { tag: "b" }, " ", { tag: "i" }, { tag: "p" }, " "]);
    expect(dropBlockWhitespace(nodes, true)).toEqual([{ tag: "b" }, " ", { tag: "i" }, { tag: "p" }]);
  });
});
