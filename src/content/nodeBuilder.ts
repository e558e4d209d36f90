import type { NodeElement, TelegraphNode } from "@/types/telegraph";

const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "aside",
  "blockquote",
  "figcaption",
  "figure",
  "h3",
  "h4",
  "hr",
  "iframe",
  "img",
  "li",
  "ol",
  "p",
  "pre",
  "ul",
  "video",
]);

export function isBlockNode(node: TelegraphNode): boolean {
  return typeof node !== "string" && BLOCK_TAGS.has(node.tag);
}

/**
 * Append nodes, merging adjacent text runs into one string
 */
export function appendNodes(target: TelegraphNode[], nodes: TelegraphNode[]): void {
  for (const node of nodes) {
    const last = target[target.length - 1];
    if (typeof node === "string" && typeof last === "string") {
      target[target.length - 1] = last + node;
    } else if (node !== "") {
      target.push(node);
    }
  }
}

export function element(tag: string, children: TelegraphNode[] = []): NodeElement {
  const node: NodeElement = { tag };
  if (children.length > 0) {
    node.children = children;
  }
  return node;
}

function hasContent(nodes: TelegraphNode[]): boolean {
  return nodes.some((node) => typeof node !== "string" || node.trim() !== "");
}

function trimRun(nodes: TelegraphNode[]): TelegraphNode[] {
  const run = [...nodes];
  const first = run[0];
  if (typeof first === "string") {
    run[0] = first.replace(/^\s+/, "");
  }
  const lastIndex = run.length - 1;
  const last = run[lastIndex];
  if (typeof last === "string") {
    run[lastIndex] = last.replace(/\s+$/, "");
  }
  return run.filter((node) => node !== "");
}

/**
 * Group inline nodes sitting between block nodes into paragraphs, so the
 * result is a flat list of blocks. `isBreak` nodes also end a paragraph.
 */
export function wrapInlineRuns(
  nodes: TelegraphNode[],
  isBreak: (node: TelegraphNode) => boolean = isBlockNode
): TelegraphNode[] {
  const blocks: TelegraphNode[] = [];
  let run: TelegraphNode[] = [];

  const flush = () => {
    if (hasContent(run)) {
      blocks.push(element("p", trimRun(run)));
    }
    run = [];
  };

  for (const node of nodes) {
    if (isBreak(node)) {
      flush();
      blocks.push(node);
    } else {
      appendNodes(run, [node]);
    }
  }
  flush();

  return blocks;
}

const isBlankText = (node: TelegraphNode) => typeof node === "string" && node.trim() === "";

/**
 * Drop whitespace-only text next to block nodes, and at the edges when the
 * parent is itself a block container
 */
export function dropBlockWhitespace(nodes: TelegraphNode[], trimEdges = false): TelegraphNode[] {
  return nodes.filter((node, index) => {
    if (!isBlankText(node)) {
      return true;
    }
    const prev = nodes[index - 1];
    const next = nodes[index + 1];
    if (prev === undefined || next === undefined) {
      return !trimEdges;
    }
    return !isBlockNode(prev) && !isBlockNode(next);
  });
}
