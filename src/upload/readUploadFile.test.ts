import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { readUploadFile } from "./readUploadFile";

describe("readUploadFile", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "telegraph-upload-"));
    await writeFile(path.join(dir, "cat.png"), new Uint8Array([137, 80, 78, 71]));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load bytes, name and mime type", async () => {
    const file = await readUploadFile(path.join(dir, "cat.png"));

    expect(file.filename).toBe("cat.png");
    expect(file.mimeType).toBe("image/png");
    expect(Array.from(file.data)).toEqual([137, 80, 78, 71]);
  });

  it("should reject missing files", async () => {
    await expect(readUploadFile(path.join(dir, "missing.png"))).rejects.toThrow();
  });
});
