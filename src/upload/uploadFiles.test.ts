import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { UploadFile, UploadProgress } from "@/types/telegraph";
import { ApiError, ValidationError } from "@/types/errors";
import { FakeTransport } from "@/client/__mocks__/fakeTransport";
import { logger } from "@/utils/logger";
import { uploadFile, uploadFiles } from "./uploadFiles";

const origin = "https://telegra.ph";

function file(filename: string, size: number): UploadFile {
  return { data: new Uint8Array(size).fill(1), filename };
}

describe("uploadFile", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    vi.spyOn(logger, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should send the file and resolve the returned path", async () => {
    transport.replyRaw('[{"src":"/file/abc.png"}]');

    const result = await uploadFile({ transport, origin }, file("a.png", 3));

    expect(result).toEqual({
      filename: "a.png",
      size: 3,
      success: true,
      url: "https://telegra.ph/file/abc.png",
    });
    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0].method).toBe("upload");
    expect(transport.calls[0].options.files).toEqual([
      { fieldName: "file", data: new Uint8Array(3).fill(1), filename: "a.png", mimeType: "image/png" },
    ]);
  });

  it("should keep absolute URLs as returned", async () => {
    transport.replyRaw('[{"src":"https://cdn.example.com/a.png"}]');

    const result = await uploadFile({ transport, origin }, file("a.png", 1));

    expect(result.url).toBe("https://cdn.example.com/a.png");
  });

  it("should report validation failures without a request", async () => {
    const result = await uploadFile({ transport, origin }, file("notes.txt", 1));

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("should report errors returned by the endpoint", async () => {
    transport.replyRaw('{"error":"File type invalid"}');

    const result = await uploadFile({ transport, origin }, file("a.gif", 1));

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(ApiError);
    expect(result.error?.message).toBe("File type invalid");
  });
});

describe("uploadFiles", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    vi.spyOn(logger, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should finish the batch when the progress callback throws", async () => {
    transport
      .replyRaw('[{"src":"/file/one.png"}]')
      .fail(new Error("socket hang up"))
      .replyRaw('[{"src":"/file/three.png"}]');
    const progress: UploadProgress[] = [];
    const onProgress = vi.fn((update: UploadProgress) => {
      progress.push(update);
      if (update.completed === 2) {
        throw new Error("progress bar crashed");
      }
    });

    const results = await uploadFiles(
      { transport, origin },
      [file("one.png", 2), file("two.jpg", 3), file("three.png", 5)],
      { onProgress }
    );

    expect(results.map((result) => result.success)).toEqual([true, false, true]);
    expect(results[1].error?.message).toBe("socket hang up");
    expect(results[2].url).toBe("https://telegra.ph/file/three.png");
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(progress.map(({ completed, total, bytesSent, totalBytes }) => [completed, total, bytesSent, totalBytes])).toEqual([
      [1, 3, 2, 10],
      [2, 3, 5, 10],
      [3, 3, 10, 10],
    ]);
    expect(logger.warn).toHaveBeenCalledWith("Upload progress callback failed", {
      filename: "two.jpg",
      error: "progress bar crashed",
    });
  });

  it("should return an empty list for no files", async () => {
    expect(await uploadFiles({ transport, origin }, [])).toEqual([]);
  });
});
