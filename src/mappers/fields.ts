import { DecodeError } from "@/types/errors";
import { isRecord } from "@/transport/decodeEnvelope";

function fieldPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw DecodeError.missingField(path || "$", "an object");
  }
  return value;
}

export function requireString(source: Record<string, unknown>, key: string, path = ""): string {
  const value = source[key];
  if (typeof value !== "string") {
    throw DecodeError.missingField(fieldPath(path, key), "a string");
  }
  return value;
}

export function requireNumber(source: Record<string, unknown>, key: string, path = ""): number {
  const value = source[key];
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw DecodeError.missingField(fieldPath(path, key), "a number");
  }
  return value;
}

export function optionalString(source: Record<string, unknown>, key: string, path = ""): string {
  const value = source[key];
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value !== "string") {
    throw DecodeError.missingField(fieldPath(path, key), "a string");
  }
  return value;
}

export function optionalNumber(source: Record<string, unknown>, key: string, path = ""): number {
  const value = source[key];
  if (value === undefined || value === null) {
    return 0;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw DecodeError.missingField(fieldPath(path, key), "a number");
  }
  return value;
}

export function optionalBoolean(source: Record<string, unknown>, key: string, path = ""): boolean {
  const value = source[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw DecodeError.missingField(fieldPath(path, key), "a boolean");
  }
  return value;
}
