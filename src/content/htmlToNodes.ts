import { parse, HTMLElement, TextNode, type Node } from "node-html-parser";
import type { NodeElement, TelegraphNode } from "@/types/telegraph";
import {
  DROPPED_TAGS,
  TAG_ALIASES,
  allowedAttributesFor,
  headingElement,
  headingLevel,
  isAllowedTag,
  isSafeUrl,
} from "./allowedTags";
import { appendNodes, dropBlockWhitespace, element, isBlockNode, wrapInlineRuns } from "./nodeBuilder";

// Elements that render nothing without a source
const SOURCE_TAGS: ReadonlySet<string> = new Set(["img", "iframe", "video"]);

function convertChildren(nodes: Node[]): TelegraphNode[] {
  const children: TelegraphNode[] = [];
  for (const node of nodes) {
    appendNodes(children, convertNode(node));
  }
  return dropBlockWhitespace(children);
}

function convertElement(el: HTMLElement): TelegraphNode[] {
  const name = el.rawTagName ? el.rawTagName.toLowerCase() : "";

  if (DROPPED_TAGS.has(name)) {
    return [];
  }

  const level = headingLevel(name);
  if (level !== null) {
    const children = dropBlockWhitespace(convertChildren(el.childNodes), true);
    if (children.length === 0) {
      return [];
    }
    const { outer, inner } = headingElement(level);
    inner.children = children;
    return [outer];
  }

  // pre keeps its raw text; nested <code> and friends are flattened
  if (name === "pre") {
    return [element("pre", [el.text.replace(/\n$/, "")].filter((text) => text !== ""))];
  }

  const tag = TAG_ALIASES[name] ?? name;
  if (!isAllowedTag(tag)) {
    return convertChildren(el.childNodes);
  }

  const node: NodeElement = { tag };
  for (const attr of allowedAttributesFor(tag)) {
    const value = el.getAttribute(attr);
    if (value !== undefined && isSafeUrl(value)) {
      node.attrs = { ...node.attrs, [attr]: value };
    }
  }

  if (tag === "a" && !node.attrs?.href) {
    return convertChildren(el.childNodes);
  }
  if (SOURCE_TAGS.has(tag) && !node.attrs?.src) {
    return [];
  }

  const children = dropBlockWhitespace(convertChildren(el.childNodes), isBlockNode(node));
  if (children.length > 0) {
    node.children = children;
  }
  return [node];
}

function convertNode(node: Node): TelegraphNode[] {
  if (node instanceof TextNode) {
    const text = node.text;
    // Line breaks in markup collapse to a space; blank text beside blocks is dropped later
    if (text.trim() === "" && text.includes("\n")) {
      return [" "];
    }
    return text === "" ? [] : [text];
  }
  if (node instanceof HTMLElement) {
    return convertElement(node);
  }
  return [];
}

function parseFragment(html: string): HTMLElement {
  return parse(html, {
    comment: false,
    blockTextElements: {
      script: true,
      noscript: true,
      style: true,
    },
  });
}

/**
 * Sanitize an inline HTML fragment into nodes without wrapping loose text
 */
export function htmlFragmentToNodes(html: string): TelegraphNode[] {
  return convertChildren(parseFragment(html).childNodes);
}

/**
 * Convert an HTML document or fragment into Telegraph content. Tags outside
 * the allowed set are unwrapped (their text kept), scripts and styles are
 * dropped, and loose inline content is grouped into paragraphs.
 */
export function htmlToNodes(html: string): TelegraphNode[] {
  return wrapInlineRuns(htmlFragmentToNodes(html));
}
