import path from "node:path";
import type { UploadFile } from "@/types/telegraph";
import { ValidationError } from "@/types/errors";

export const MAX_UPLOAD_SIZE = 50 * 1024 * 1024;

/**
 * Extensions the upload endpoint accepts, with the mime type sent for each
 */
export const UPLOAD_MIME_TYPES: Readonly<Record<string, string>> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".mp4": "video/mp4",
};

const ALLOWED_MIME_TYPES: ReadonlySet<string> = new Set(Object.values(UPLOAD_MIME_TYPES));

export function mimeTypeFor(filename: string): string | undefined {
  return UPLOAD_MIME_TYPES[path.extname(filename).toLowerCase()];
}

/**
 * Resolve the mime type to send, or fail when the file cannot be uploaded
 */
export function validateUploadFile(file: UploadFile): string {
  if (file.data.byteLength === 0) {
    throw new ValidationError("file", `${file.filename} is empty`, file.filename);
  }
  if (file.data.byteLength > MAX_UPLOAD_SIZE) {
    throw new ValidationError(
      "file",
      `${file.filename} exceeds ${MAX_UPLOAD_SIZE} bytes`,
      file.data.byteLength
    );
  }

  const mimeType = file.mimeType ?? mimeTypeFor(file.filename);
  if (!mimeType || !ALLOWED_MIME_TYPES.has(mimeType)) {
    throw new ValidationError("file", `${file.filename} has an unsupported file type`, mimeType);
  }
  return mimeType;
}
