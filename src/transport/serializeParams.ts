export type ParamValue = string | number | boolean | object | null | undefined;

export type RequestParams = Record<string, ParamValue>;

/**
 * Flatten request params into string fields. `undefined` is skipped, objects
 * and arrays (content nodes, field lists) are sent as JSON.
 */
export function serializeParams(params: RequestParams): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === "string") {
      fields[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      fields[key] = String(value);
    } else {
      fields[key] = JSON.stringify(value);
    }
  }

  return fields;
}

/**
 * Copy of the serialized fields safe to log
 */
export function redactParams(fields: Record<string, string>): Record<string, string> {
  if (!("access_token" in fields)) {
    return fields;
  }
  return { ...fields, access_token: "[REDACTED]" };
}
