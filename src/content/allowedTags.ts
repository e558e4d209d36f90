import {
  ALLOWED_TAGS,
  type AllowedTag,
  type NodeAttribute,
  type NodeElement,
} from "@/types/telegraph";

const allowedTagSet: ReadonlySet<string> = new Set(ALLOWED_TAGS);

export function isAllowedTag(tag: string): tag is AllowedTag {
  return allowedTagSet.has(tag);
}

/**
 * Attributes Telegraph keeps, per tag
 */
export const ALLOWED_ATTRIBUTES: Partial<Record<AllowedTag, readonly NodeAttribute[]>> = {
  a: ["href"],
  img: ["src"],
  iframe: ["src"],
  video: ["src"],
};

export function allowedAttributesFor(tag: string): readonly NodeAttribute[] {
  return isAllowedTag(tag) ? (ALLOWED_ATTRIBUTES[tag] ?? []) : [];
}

/**
 * Elements whose content is dropped together with the tag
 */
export const DROPPED_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "noscript",
  "template",
  "head",
  "title",
]);

/**
 * Tags with an allowed equivalent
 */
export const TAG_ALIASES: Readonly<Record<string, AllowedTag>> = {
  del: "s",
  strike: "s",
  ins: "u",
};

/**
 * Heading degradation. Telegraph only renders h3 and h4:
 *
 * | level | node              |
 * | ----- | ----------------- |
 * | 1     | h3                |
 * | 2     | h4                |
 * | 3-6   | p > strong (bold) |
 *
 * Returns the outer element and the element children are appended to.
 */
export function headingElement(level: number): { outer: NodeElement; inner: NodeElement } {
  if (level <= 1) {
    const heading: NodeElement = { tag: "h3" };
    return { outer: heading, inner: heading };
  }
  if (level === 2) {
    const heading: NodeElement = { tag: "h4" };
    return { outer: heading, inner: heading };
  }
  const bold: NodeElement = { tag: "strong" };
  return { outer: { tag: "p", children: [bold] }, inner: bold };
}

export function headingLevel(tag: string): number | null {
  const match = /^h([1-6])$/.exec(tag);
  return match ? Number(match[1]) : null;
}

const UNSAFE_SCHEME = /^\s*(javascript|vbscript|data):/i;

export function isSafeUrl(url: string): boolean {
  return url.trim() !== "" && !UNSAFE_SCHEME.test(url);
}
