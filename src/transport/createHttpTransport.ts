import { HttpError, TransportError } from "@/types/errors";
import { logger } from "@/utils/logger";
import { redactParams, serializeParams, type RequestParams } from "./serializeParams";

export type HttpMethod = "GET" | "POST";

export interface FilePart {
  fieldName: string;
  data: Uint8Array;
  filename: string;
  mimeType?: string;
}

export interface SendOptions {
  httpMethod?: HttpMethod;
  files?: FilePart[];
}

/**
 * Issues one request against `{baseUrl}/{method}` and resolves with the raw body
 */
export interface Transport {
  send(method: string, params?: RequestParams, options?: SendOptions): Promise<string>;
}

export interface HttpTransportOptions {
  baseUrl: string;
  timeoutMs: number;
}

export function createHttpTransport({ baseUrl, timeoutMs }: HttpTransportOptions): Transport {
  const root = baseUrl.replace(/\/+$/, "");

  return {
    async send(method, params = {}, { httpMethod = "POST", files = [] } = {}) {
      const fields = serializeParams(params);

      let url = `${root}/${method}`;
      const init: RequestInit = { method: httpMethod };

      if (httpMethod === "GET") {
        const query = new URLSearchParams(fields).toString();
        if (query) {
          url = `${url}?${query}`;
        }
      } else if (files.length > 0) {
        const formData = new FormData();
        for (const [key, value] of Object.entries(fields)) {
          formData.append(key, value);
        }
        for (const file of files) {
          const blob = new Blob([file.data], {
            type: file.mimeType ?? "application/octet-stream",
          });
          formData.append(file.fieldName, blob, file.filename);
        }
        init.body = formData;
      } else {
        init.headers = { "Content-Type": "application/x-www-form-urlencoded" };
        init.body = new URLSearchParams(fields).toString();
      }

      logger.debug("Telegraph request", {
        url: `${root}/${method}`,
        method: httpMethod,
        params: redactParams(fields),
        files: files.map((file) => ({ filename: file.filename, size: file.data.byteLength })),
      });

      let response: Response;
      try {
        response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
          throw TransportError.timeout(`${root}/${method}`, timeoutMs, error);
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Request to ${root}/${method} failed: ${reason}`, "NETWORK", error);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Reading response from ${root}/${method} failed: ${reason}`, "NETWORK", error);
      }

      if (!response.ok) {
        logger.warn("Telegraph request failed", { method, status: response.status });
        throw new HttpError(response.status, body);
      }

      logger.debug("Telegraph response", { method, status: response.status });
      return body;
    },
  };
}
