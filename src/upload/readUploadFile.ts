import { readFile } from "node:fs/promises";
import path from "node:path";
import type { UploadFile } from "@/types/telegraph";
import { mimeTypeFor } from "./validateUploadFile";

/**
 * Load a file from disk into an upload descriptor
 */
export async function readUploadFile(filePath: string): Promise<UploadFile> {
  const data = await readFile(filePath);
  const filename = path.basename(filePath);

  return {
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    filename,
    mimeType: mimeTypeFor(filename),
  };
}
