import type { TelegraphNode } from "@/types/telegraph";
import { ValidationError } from "@/types/errors";
import { allowedAttributesFor, isAllowedTag } from "./allowedTags";

export const MAX_TITLE_LENGTH = 256;
export const MAX_SHORT_NAME_LENGTH = 32;
export const MAX_AUTHOR_NAME_LENGTH = 128;
export const MAX_AUTHOR_URL_LENGTH = 512;
export const MAX_CONTENT_SIZE = 64 * 1024;

const ALLOWED_URL_SCHEMES = ["http:", "https:"];

function validateLength(field: string, value: string, min: number, max: number): void {
  if (value.length < min || value.length > max) {
    throw new ValidationError(field, `must be ${min}-${max} characters long`, value);
  }
}

export function validateTitle(title: string): void {
  validateLength("title", title, 1, MAX_TITLE_LENGTH);
}

export function validateShortName(shortName: string): void {
  validateLength("short_name", shortName, 1, MAX_SHORT_NAME_LENGTH);
}

export function validateAuthorName(authorName: string): void {
  validateLength("author_name", authorName, 0, MAX_AUTHOR_NAME_LENGTH);
}

export function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return ALLOWED_URL_SCHEMES.includes(parsed.protocol) && parsed.host !== "";
  } catch {
    return false;
  }
}

export function validateUrl(field: string, url: string): void {
  validateLength(field, url, 0, MAX_AUTHOR_URL_LENGTH);
  if (url !== "" && !isHttpUrl(url)) {
    throw new ValidationError(field, "must be an http(s) URL", url);
  }
}

/**
 * Check a node tree against the tags and attributes Telegraph accepts
 */
export function validateNodes(nodes: TelegraphNode[], path = "content"): void {
  nodes.forEach((node, index) => {
    const nodePath = `${path}[${index}]`;
    if (typeof node === "string") {
      return;
    }
    if (!isAllowedTag(node.tag)) {
      throw new ValidationError(`${nodePath}.tag`, `tag "${node.tag}" is not allowed`, node.tag);
    }
    const allowed = allowedAttributesFor(node.tag);
    for (const name of Object.keys(node.attrs ?? {})) {
      if (!allowed.some((attr) => attr === name)) {
        throw new ValidationError(
          `${nodePath}.attrs.${name}`,
          `attribute not allowed on <${node.tag}>`,
          name
        );
      }
    }
    if (node.children) {
      validateNodes(node.children, `${nodePath}.children`);
    }
  });
}

/**
 * Content must be non-empty and at most 64 KiB once serialized
 */
export function validateContentSize(nodes: TelegraphNode[]): void {
  if (nodes.length === 0) {
    throw new ValidationError("content", "must not be empty");
  }
  const size = new TextEncoder().encode(JSON.stringify(nodes)).byteLength;
  if (size > MAX_CONTENT_SIZE) {
    throw new ValidationError("content", `must be at most ${MAX_CONTENT_SIZE} bytes, got ${size}`, size);
  }
}
