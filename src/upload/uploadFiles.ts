import type { UploadFile, UploadOptions, UploadResult } from "@/types/telegraph";
import type { Transport } from "@/transport/createHttpTransport";
import { decodeUploadResponse, parseJson } from "@/transport/decodeEnvelope";
import { DecodeError } from "@/types/errors";
import { logger } from "@/utils/logger";
import { validateUploadFile } from "./validateUploadFile";

export interface UploadContext {
  transport: Transport;
  /** Origin that relative `src` values are resolved against, e.g. https://telegra.ph */
  origin: string;
}

function absoluteUrl(src: string, origin: string): string {
  return src.startsWith("/") ? `${origin}${src}` : src;
}

/**
 * Upload one file. Failures are returned in the result, not thrown.
 */
export async function uploadFile(
  { transport, origin }: UploadContext,
  file: UploadFile
): Promise<UploadResult> {
  const size = file.data.byteLength;

  try {
    const mimeType = validateUploadFile(file);
    const body = await transport.send("upload", {}, {
      files: [{ fieldName: "file", data: file.data, filename: file.filename, mimeType }],
    });
    const [src] = decodeUploadResponse(parseJson(body));
    if (src === undefined) {
      throw new DecodeError("Upload response listed no files");
    }
    return { filename: file.filename, size, success: true, url: absoluteUrl(src, origin) };
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    logger.warn("Upload failed", { filename: file.filename, error: failure.message });
    return { filename: file.filename, size, success: false, error: failure };
  }
}

/**
 * Upload files one after another. Each file succeeds or fails on its own;
 * `onProgress` runs after every file and its errors never stop the loop.
 */
export async function uploadFiles(
  context: UploadContext,
  files: UploadFile[],
  { onProgress }: UploadOptions = {}
): Promise<UploadResult[]> {
  const totalBytes = files.reduce((sum, file) => sum + file.data.byteLength, 0);
  const results: UploadResult[] = [];
  let bytesSent = 0;

  for (const file of files) {
    const result = await uploadFile(context, file);
    results.push(result);
    bytesSent += result.size;

    if (onProgress) {
      try {
        onProgress({
          completed: results.length,
          total: files.length,
          bytesSent,
          totalBytes,
          result,
        });
      } catch (error) {
        logger.warn("Upload progress callback failed", {
          filename: file.filename,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  logger.info("Upload batch finished", {
    total: files.length,
    succeeded: results.filter((result) => result.success).length,
  });

  return results;
}
