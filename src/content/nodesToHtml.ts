import { escape } from "he";
import type { TelegraphNode } from "@/types/telegraph";
import { htmlToNodes } from "./htmlToNodes";

const VOID_TAGS: ReadonlySet<string> = new Set(["br", "hr", "img"]);

/**
 * Render nodes back to HTML, escaping text and attribute values
 */
export function nodesToHtml(nodes: TelegraphNode[]): string {
  return nodes.map(nodeToHtml).join("");
}

function nodeToHtml(node: TelegraphNode): string {
  if (typeof node === "string") {
    return escape(node);
  }

  const attrs = Object.entries(node.attrs ?? {})
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([name, value]) => ` ${name}="${escape(value)}"`)
    .join("");

  if (VOID_TAGS.has(node.tag) && !node.children?.length) {
    return `<${node.tag}${attrs}>`;
  }

  return `<${node.tag}${attrs}>${nodesToHtml(node.children ?? [])}</${node.tag}>`;
}

/**
 * Reduce arbitrary HTML to the markup Telegraph accepts
 */
export function sanitizeHtml(html: string): string {
  return nodesToHtml(htmlToNodes(html));
}
