export { TelegraphClient, DEFAULT_ACCOUNT_FIELDS, MAX_PAGE_LIST_LIMIT } from "./client/TelegraphClient";
export type { TelegraphClientOptions } from "./client/TelegraphClient";

export {
  TelegraphError,
  TelegraphErrorType,
  TransportError,
  HttpError,
  DecodeError,
  ApiError,
  ValidationError,
  API_ERROR_KINDS,
  classifyApiError,
} from "./types/errors";
export type { ApiErrorKind } from "./types/errors";

export { ALLOWED_TAGS } from "./types/telegraph";
export type {
  Account,
  AccountChanges,
  AccountField,
  AccountInput,
  AllowedTag,
  ContentType,
  GetPageOptions,
  NodeAttribute,
  NodeAttributes,
  NodeElement,
  Page,
  PageInput,
  PageListOptions,
  PageViews,
  RequestOptions,
  TelegraphNode,
  UploadFile,
  UploadOptions,
  UploadProgress,
  UploadProgressCallback,
  UploadResult,
  ViewsWindow,
} from "./types/telegraph";
export type { Env } from "./types/env";

export { createHttpTransport } from "./transport/createHttpTransport";
export type { Transport, SendOptions, FilePart, HttpMethod } from "./transport/createHttpTransport";
export type { RequestParams } from "./transport/serializeParams";

export { mapNode, mapNodes, nodeToJson, nodesToJson } from "./mappers/mapNode";
export { htmlToNodes } from "./content/htmlToNodes";
export { markdownToNodes } from "./content/markdownToNodes";
export { nodesToHtml, sanitizeHtml } from "./content/nodesToHtml";
export { validateNodes } from "./content/validateContent";

export { readUploadFile } from "./upload/readUploadFile";
export { MAX_UPLOAD_SIZE, UPLOAD_MIME_TYPES } from "./upload/validateUploadFile";

export { loadConfig, DEFAULT_CONFIG } from "./utils/config";
export type { TelegraphConfig } from "./utils/config";
export { logger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
