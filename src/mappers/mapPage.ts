import type { Page } from "@/types/telegraph";
import { DecodeError } from "@/types/errors";
import { expectRecord, optionalBoolean, optionalNumber, optionalString, requireString } from "./fields";
import { mapNodes } from "./mapNode";

export function mapPage(json: unknown, path = ""): Page {
  const source = expectRecord(json, path);
  const prefix = path ? `${path}.` : "";

  return Object.freeze({
    path: requireString(source, "path", path),
    url: requireString(source, "url", path),
    title: requireString(source, "title", path),
    description: optionalString(source, "description", path),
    authorName: optionalString(source, "author_name", path),
    authorUrl: optionalString(source, "author_url", path),
    imageUrl: optionalString(source, "image_url", path),
    content: source.content === undefined ? [] : mapNodes(source.content, `${prefix}content`),
    views: optionalNumber(source, "views", path),
    canEdit: optionalBoolean(source, "can_edit", path),
  });
}

/**
 * Decode a `{ total_count, pages }` list into its ordered pages
 */
export function mapPageList(json: unknown): Page[] {
  const source = expectRecord(json, "");
  const pages = source.pages;
  if (!Array.isArray(pages)) {
    throw DecodeError.missingField("pages", "an array");
  }
  return pages.map((page, index) => mapPage(page, `pages[${index}]`));
}

