import { ApiError, DecodeError } from "@/types/errors";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`Response is not valid JSON: ${reason}`);
  }
}

/**
 * Unwrap an `{ ok, result | error }` envelope, returning `result` verbatim
 */
export function decodeEnvelope(payload: unknown): unknown {
  if (!isRecord(payload) || typeof payload.ok !== "boolean") {
    throw DecodeError.missingField("ok", "an envelope with a boolean");
  }

  if (!payload.ok) {
    const message = typeof payload.error === "string" ? payload.error : "UNKNOWN_ERROR";
    throw new ApiError(message);
  }

  if (!("result" in payload) || payload.result === undefined) {
    throw DecodeError.missingField("result", "a result payload");
  }

  return payload.result;
}

/**
 * The upload endpoint answers with `[{ src }]` on success and `{ error }` on failure
 */
export function decodeUploadResponse(payload: unknown): string[] {
  if (isRecord(payload)) {
    if (typeof payload.error === "string") {
      throw new ApiError(payload.error);
    }
    throw DecodeError.missingField("error", "a string");
  }

  if (!Array.isArray(payload)) {
    throw new DecodeError("Expected an array of uploaded files");
  }

  return payload.map((item, index) => {
    if (!isRecord(item) || typeof item.src !== "string") {
      throw DecodeError.missingField(`[${index}].src`, "a string");
    }
    return item.src;
  });
}
