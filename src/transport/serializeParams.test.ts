import { describe, it, expect } from "vitest";
import { redactParams, serializeParams } from "./serializeParams";

describe("serializeParams", () => {
  it("should stringify scalars and JSON-encode objects", () => {
    const fields = serializeParams({
      title: "Hello",
      limit: 50,
      return_content: false,
      content: [{ tag: "p", children: ["hi"] }],
      fields: ["short_name", "page_count"],
      author_name: undefined,
    });

    expect(fields).toEqual({
      title: "Hello",
      limit: "50",
      return_content: "false",
      content: '[{"tag":"p","children":["hi"]}]',
      fields: '["short_name","page_count"]',
    });
  });

  it("should keep empty strings", () => {
    expect(serializeParams({ author_url: "" })).toEqual({ author_url: "" });
  });
});

describe("redactParams", () => {
  it("should hide the access token", () => {
    expect(redactParams({ access_token: "test-secret", path: "T-01-01" })).toEqual({
      access_token: "[REDACTED]",
      path: "T-01-01",
    });
  });

  it("should return fields without a token unchanged", () => {
    const fields = { path: "T-01-01" };
    expect(redactParams(fields)).toBe(fields);
  });
});
