import { describe, it, expect } from "vitest";
import { DecodeError } from "@/types/errors";
import { mapNode, mapNodes, nodesToJson } from "./mapNode";

describe("mapNode", () => {
  it("should pass text through", () => {
    expect(mapNode("hello")).toBe("hello");
  });

  it("should decode nested elements", () => {
    const json = {
      tag: "p",
      children: ["See ", { tag: "a", attrs: { href: "https://example.com" }, children: ["this"] }],
    };

    expect(mapNode(json)).toEqual(json);
  });

  it("should omit attrs and children the source does not have", () => {
    expect(mapNode({ tag: "hr" })).toEqual({ tag: "hr" });
  });

  it("should drop attributes other than href and src", () => {
    expect(mapNode({ tag: "img", attrs: { src: "/file/a.png", width: "20" } })).toEqual({
      tag: "img",
      attrs: { src: "/file/a.png" },
    });
  });

  it("should report the path of a malformed child", () => {
    expect(() => mapNodes([{ tag: "p", children: [{ children: [] }] }])).toThrow(
      'Expected a string at "content[0].children[0].tag"'
    );
  });

  it("should reject non-string attribute values", () => {
    expect(() => mapNode({ tag: "a", attrs: { href: 1 } })).toThrow(DecodeError);
  });

  it("should reject content that is not an array", () => {
    expect(() => mapNodes("text")).toThrow('Expected an array of nodes at "content"');
  });
});

describe("nodesToJson", () => {
  it("should produce the same JSON the nodes were decoded from", () => {
    const json = [
      { tag: "h3", children: ["Title"] },
      { tag: "figure", children: [{ tag: "img", attrs: { src: "/file/a.png" } }] },
      "tail",
    ];

    expect(nodesToJson(mapNodes(json))).toEqual(json);
  });
});
