import type { Account } from "@/types/telegraph";
import { expectRecord, optionalNumber, optionalString, requireString } from "./fields";

export function mapAccount(json: unknown): Account {
  const source = expectRecord(json, "");

  return Object.freeze({
    shortName: requireString(source, "short_name"),
    authorName: optionalString(source, "author_name"),
    authorUrl: optionalString(source, "author_url"),
    accessToken: optionalString(source, "access_token"),
    authUrl: optionalString(source, "auth_url"),
    pageCount: optionalNumber(source, "page_count"),
  });
}
