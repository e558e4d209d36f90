import MarkdownIt from "markdown-it";
import type { TelegraphNode } from "@/types/telegraph";
import { headingElement, headingLevel, isSafeUrl } from "./allowedTags";
import { htmlFragmentToNodes } from "./htmlToNodes";
import { appendNodes, element, isBlockNode, wrapInlineRuns } from "./nodeBuilder";

type Token = ReturnType<MarkdownIt["parse"]>[number];

/**
 * An open token waiting for its close token. `finish` turns the collected
 * children into the nodes appended to the parent.
 */
interface Container {
  tag: string;
  children: TelegraphNode[];
  finish: (children: TelegraphNode[], parent: Container) => TelegraphNode[];
}

// Containers whose paragraphs are unwrapped; Telegraph renders them as inline text
const INLINE_CONTAINERS: ReadonlySet<string> = new Set(["li", "blockquote"]);

const PASSTHROUGH_TAGS: Readonly<Record<string, string>> = {
  ul: "ul",
  ol: "ol",
  li: "li",
  blockquote: "blockquote",
  strong: "strong",
  em: "em",
  s: "s",
};

const md = new MarkdownIt({ html: true });

const unwrap = (children: TelegraphNode[]) => children;

const isFigure = (node: TelegraphNode) => typeof node !== "string" && node.tag === "figure";

function openContainer(token: Token, parent: Container): Container {
  const tag = token.tag;

  const level = token.type === "heading_open" ? headingLevel(tag) : null;
  if (level !== null) {
    return {
      tag,
      children: [],
      finish: (children) => {
        if (children.length === 0) {
          return [];
        }
        const { outer, inner } = headingElement(level);
        inner.children = children;
        return [outer];
      },
    };
  }

  switch (token.type) {
    case "paragraph_open":
      if (INLINE_CONTAINERS.has(parent.tag)) {
        return {
          tag,
          children: [],
          finish: (children, container) => {
            const previous = container.children[container.children.length - 1];
            // Only a preceding run of inline text needs a line break
            return previous !== undefined && !isBlockNode(previous) && children.length > 0
              ? [element("br"), ...children]
              : children;
          },
        };
      }
      // Images become figures and are lifted out of the paragraph
      return { tag, children: [], finish: (children) => wrapInlineRuns(children, isFigure) };
    case "link_open": {
      const href = token.attrGet("href");
      if (href === null || !isSafeUrl(href)) {
        return { tag, children: [], finish: unwrap };
      }
      return {
        tag,
        children: [],
        finish: (children) => [{ ...element("a", children), attrs: { href } }],
      };
    }
    case "tr_open":
      return {
        tag,
        children: [],
        finish: (children) => (children.length > 0 ? [element("p", children)] : []),
      };
    case "th_open":
    case "td_open":
      return {
        tag,
        children: [],
        finish: (children, row) => {
          const cell =
            token.type === "th_open" && children.length > 0 ? [element("strong", children)] : children;
          return row.children.length > 0 ? [" | ", ...cell] : cell;
        },
      };
  }

  const mapped = PASSTHROUGH_TAGS[tag];
  if (mapped) {
    return { tag, children: [], finish: (children) => [element(mapped, children)] };
  }

  // table, thead, tbody and anything a plugin adds
  return { tag, children: [], finish: unwrap };
}

function imageNode(token: Token): TelegraphNode[] {
  const src = token.attrGet("src");
  const caption = token.attrGet("title") || token.content;

  if (src === null || !isSafeUrl(src)) {
    return caption ? [caption] : [];
  }

  const children: TelegraphNode[] = [{ tag: "img", attrs: { src } }];
  if (caption) {
    children.push(element("figcaption", [caption]));
  }
  return [element("figure", children)];
}

function leafNodes(token: Token): TelegraphNode[] {
  switch (token.type) {
    case "text":
    case "text_special":
      return [token.content];
    case "softbreak":
      return ["\n"];
    case "hardbreak":
      return [element("br")];
    case "code_inline":
      return [element("code", [token.content])];
    case "code_block":
    case "fence":
      return [element("pre", [token.content.replace(/\n$/, "")].filter((text) => text !== ""))];
    case "hr":
      return [element("hr")];
    case "image":
      return imageNode(token);
    case "html_block":
    case "html_inline":
      return htmlFragmentToNodes(token.content);
    default:
      return token.content ? [token.content] : [];
  }
}

function closeContainer(stack: Container[]): void {
  const closed = stack.pop();
  const parent = stack[stack.length - 1];
  if (closed && parent) {
    appendNodes(parent.children, closed.finish(closed.children, parent));
  }
}

function walk(tokens: Token[], stack: Container[]): void {
  for (const token of tokens) {
    const current = stack[stack.length - 1];

    if (token.nesting === 1) {
      stack.push(openContainer(token, current));
      continue;
    }

    if (token.nesting === -1) {
      if (stack.length > 1) {
        closeContainer(stack);
      }
      continue;
    }

    if (token.type === "inline") {
      const children = token.children ?? [];
      // Inline HTML arrives as separate open/close fragments, so the whole
      // run is rendered back to HTML and sanitized in one piece
      if (children.some((child) => child.type === "html_inline")) {
        appendNodes(current.children, htmlFragmentToNodes(md.renderer.renderInline(children, md.options, {})));
      } else {
        walk(children, stack);
      }
      continue;
    }

    appendNodes(current.children, leafNodes(token));
  }
}

/**
 * Convert Markdown into a flat list of Telegraph block nodes.
 * See `headingElement` for how headings degrade.
 */
export function markdownToNodes(markdown: string): TelegraphNode[] {
  const root: Container = { tag: "root", children: [], finish: unwrap };
  const stack: Container[] = [root];

  walk(md.parse(markdown, {}), stack);

  // Close anything a malformed token stream left open
  while (stack.length > 1) {
    closeContainer(stack);
  }

  return wrapInlineRuns(root.children);
}
