import nock from "@/utils/test/nock";
import type { RequestBodyMatcher } from "nock";

export const API_BASE_URL = "https://api.telegra.ph";
export const UPLOAD_BASE_URL = "https://telegra.ph";

export function mockApiMethod(
  method: string,
  options: {
    body?: RequestBodyMatcher;
    result?: unknown;
    status?: number;
    response?: unknown;
  } = {}
) {
  const response = options.response ?? { ok: true, result: options.result ?? {} };
  return nock(API_BASE_URL)
    .post(`/${method}`, options.body ?? (() => true))
    .reply(options.status ?? 200, JSON.stringify(response));
}

export function mockApiGet(
  method: string,
  query: Record<string, string>,
  options: { result?: unknown; response?: unknown } = {}
) {
  const response = options.response ?? { ok: true, result: options.result ?? {} };
  return nock(API_BASE_URL).get(`/${method}`).query(query).reply(200, JSON.stringify(response));
}

export function mockUpload(response: unknown, status = 200) {
  return nock(UPLOAD_BASE_URL).post("/upload").reply(status, JSON.stringify(response));
}
