import type {
  Account,
  AccountChanges,
  AccountField,
  AccountInput,
  GetPageOptions,
  Page,
  PageInput,
  PageListOptions,
  PageViews,
  RequestOptions,
  TelegraphNode,
  UploadFile,
  UploadOptions,
  UploadResult,
  ViewsWindow,
} from "@/types/telegraph";
import type { Env } from "@/types/env";
import { ValidationError } from "@/types/errors";
import {
  createHttpTransport,
  type HttpMethod,
  type Transport,
} from "@/transport/createHttpTransport";
import type { RequestParams } from "@/transport/serializeParams";
import { decodeEnvelope, parseJson } from "@/transport/decodeEnvelope";
import { mapAccount } from "@/mappers/mapAccount";
import { mapPage, mapPageList } from "@/mappers/mapPage";
import { mapPageViews } from "@/mappers/mapPageViews";
import { nodesToJson } from "@/mappers/mapNode";
import { htmlToNodes } from "@/content/htmlToNodes";
import { markdownToNodes } from "@/content/markdownToNodes";
import {
  validateAuthorName,
  validateContentSize,
  validateNodes,
  validateShortName,
  validateTitle,
  validateUrl,
} from "@/content/validateContent";
import { uploadFile, uploadFiles, type UploadContext } from "@/upload/uploadFiles";
import { loadConfig } from "@/utils/config";
import { logger } from "@/utils/logger";

export interface TelegraphClientOptions {
  accessToken?: string;
  /** Telegraph domain; the API lives at api.{domain} */
  domain?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport used for API methods */
  transport?: Transport;
  /** Replaces the HTTP transport used for file uploads */
  uploadTransport?: Transport;
}

export const DEFAULT_ACCOUNT_FIELDS: AccountField[] = [
  "short_name",
  "author_name",
  "author_url",
  "auth_url",
  "page_count",
];

export const MAX_PAGE_LIST_LIMIT = 200;

/**
 * Client for the Telegraph API. Every method makes at most one request and
 * the instance is never mutated; `withAccessToken` returns a client for
 * another account.
 */
export class TelegraphClient {
  private readonly options: TelegraphClientOptions;
  private readonly transport: Transport;
  private readonly uploadContext: UploadContext;

  constructor(options: TelegraphClientOptions = {}) {
    const domain = options.domain ?? "telegra.ph";
    const timeoutMs = options.timeoutMs ?? 30000;

    const transport =
      options.transport ?? createHttpTransport({ baseUrl: `https://api.${domain}`, timeoutMs });
    const uploadTransport =
      options.uploadTransport ?? createHttpTransport({ baseUrl: `https://${domain}`, timeoutMs });

    this.options = { ...options, domain, timeoutMs, transport, uploadTransport };
    this.transport = transport;
    this.uploadContext = { transport: uploadTransport, origin: `https://${domain}` };
  }

  /**
   * Build a client from TELEGRAPH_* environment variables
   */
  static fromEnv(env?: Env): TelegraphClient {
    const config = loadConfig(env);
    return new TelegraphClient({
      accessToken: config.accessToken,
      domain: config.domain,
      timeoutMs: config.timeoutMs,
    });
  }

  get accessToken(): string | undefined {
    return this.options.accessToken;
  }

  get domain(): string {
    return this.options.domain ?? "telegra.ph";
  }

  /**
   * A new client bound to another access token, sharing this client's transports
   */
  withAccessToken(accessToken: string): TelegraphClient {
    return new TelegraphClient({ ...this.options, accessToken });
  }

  private async call(
    method: string,
    params: RequestParams,
    httpMethod: HttpMethod = "POST"
  ): Promise<unknown> {
    const body = await this.transport.send(method, params, { httpMethod });
    return decodeEnvelope(parseJson(body));
  }

  /**
   * Token params for account-scoped methods; fails before any request when no token is known
   */
  private tokenParams(options: RequestOptions = {}): RequestParams {
    const token = options.accessToken ?? this.options.accessToken;
    if (!token) {
      throw new ValidationError("access_token", "an access token is required for this method");
    }
    return { access_token: token };
  }

  private prepareContent(input: PageInput): TelegraphNode[] {
    validateTitle(input.title);
    if (input.authorName !== undefined) validateAuthorName(input.authorName);
    if (input.authorUrl !== undefined) validateUrl("author_url", input.authorUrl);

    const contentType = input.contentType ?? (typeof input.content === "string" ? "html" : "nodes");
    let nodes: TelegraphNode[];

    if (contentType === "nodes") {
      if (typeof input.content === "string") {
        throw new ValidationError("content", "nodes content must be an array", input.content);
      }
      nodes = nodesToJson(input.content);
      validateNodes(nodes);
    } else {
      if (typeof input.content !== "string") {
        throw new ValidationError("content", `${contentType} content must be a string`);
      }
      nodes = contentType === "markdown" ? markdownToNodes(input.content) : htmlToNodes(input.content);
    }

    validateContentSize(nodes);
    return nodes;
  }

  private pageParams(input: PageInput, content: TelegraphNode[]): RequestParams {
    return {
      title: input.title,
      content,
      author_name: input.authorName,
      author_url: input.authorUrl,
      return_content: input.returnContent ?? false,
    };
  }

  async createAccount({ shortName, authorName, authorUrl }: AccountInput): Promise<Account> {
    validateShortName(shortName);
    if (authorName !== undefined) validateAuthorName(authorName);
    if (authorUrl !== undefined) validateUrl("author_url", authorUrl);

    const result = await this.call("createAccount", {
      short_name: shortName,
      author_name: authorName,
      author_url: authorUrl,
    });
    const account = mapAccount(result);
    logger.info("Created Telegraph account", { shortName: account.shortName });
    return account;
  }

  async getAccountInfo(
    fields: AccountField[] = DEFAULT_ACCOUNT_FIELDS,
    options?: RequestOptions
  ): Promise<Account> {
    const params = this.tokenParams(options);
    return mapAccount(await this.call("getAccountInfo", { ...params, fields }));
  }

  async editAccountInfo(changes: AccountChanges, options?: RequestOptions): Promise<Account> {
    const params = this.tokenParams(options);
    const { shortName, authorName, authorUrl } = changes;

    if (shortName === undefined && authorName === undefined && authorUrl === undefined) {
      throw new ValidationError("fields", "at least one field must be provided");
    }
    if (shortName !== undefined) validateShortName(shortName);
    if (authorName !== undefined) validateAuthorName(authorName);
    if (authorUrl !== undefined) validateUrl("author_url", authorUrl);

    return mapAccount(
      await this.call("editAccountInfo", {
        ...params,
        short_name: shortName,
        author_name: authorName,
        author_url: authorUrl,
      })
    );
  }

  /**
   * Revoke the token and get a new one. The client keeps its old token;
   * call `withAccessToken(account.accessToken)` to continue.
   */
  async revokeAccessToken(options?: RequestOptions): Promise<Account> {
    const params = this.tokenParams(options);
    const account = mapAccount(await this.call("revokeAccessToken", params));
    logger.info("Revoked Telegraph access token", { shortName: account.shortName });
    return account;
  }

  async createPage(input: PageInput, options?: RequestOptions): Promise<Page> {
    const params = this.tokenParams(options);
    const content = this.prepareContent(input);

    const page = mapPage(await this.call("createPage", { ...params, ...this.pageParams(input, content) }));
    logger.info("Created Telegraph page", { path: page.path });
    return page;
  }

  /**
   * Replace a page's title and content. There is no partial update.
   */
  async editPage(path: string, input: PageInput, options?: RequestOptions): Promise<Page> {
    const params = this.tokenParams(options);
    if (!path) {
      throw new ValidationError("path", "must not be empty", path);
    }
    const content = this.prepareContent(input);

    const page = mapPage(
      await this.call("editPage", { ...params, path, ...this.pageParams(input, content) })
    );
    logger.info("Edited Telegraph page", { path: page.path });
    return page;
  }

  async getPage(path: string, { returnContent = true }: GetPageOptions = {}): Promise<Page> {
    if (!path) {
      throw new ValidationError("path", "must not be empty", path);
    }
    return mapPage(await this.call("getPage", { path, return_content: returnContent }, "GET"));
  }

  async getPageList(
    { offset = 0, limit = 50 }: PageListOptions = {},
    options?: RequestOptions
  ): Promise<Page[]> {
    const params = this.tokenParams(options);
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("offset", "must be a non-negative integer", offset);
    }
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ValidationError("limit", "must be a non-negative integer", limit);
    }

    return mapPageList(
      await this.call("getPageList", {
        ...params,
        offset,
        limit: Math.min(limit, MAX_PAGE_LIST_LIMIT),
      })
    );
  }

  async getViews(path: string, window: ViewsWindow = {}): Promise<PageViews> {
    if (!path) {
      throw new ValidationError("path", "must not be empty", path);
    }
    validateViewsWindow(window);

    const result = await this.call(
      "getViews",
      { path, year: window.year, month: window.month, day: window.day, hour: window.hour },
      "GET"
    );
    return mapPageViews(result, window);
  }

  async uploadFile(file: UploadFile): Promise<UploadResult> {
    return uploadFile(this.uploadContext, file);
  }

  /**
   * Upload files in order, one request per file
   */
  async upload(files: UploadFile[], options?: UploadOptions): Promise<UploadResult[]> {
    return uploadFiles(this.uploadContext, files, options);
  }

  convertMarkdown(markdown: string): TelegraphNode[] {
    return markdownToNodes(markdown);
  }
}

const VIEWS_RANGES: Array<[keyof ViewsWindow, number, number, keyof ViewsWindow | null]> = [
  ["year", 2000, 2100, null],
  ["month", 1, 12, "year"],
  ["day", 1, 31, "month"],
  ["hour", 0, 24, "day"],
];

function validateViewsWindow(window: ViewsWindow): void {
  for (const [field, min, max, requires] of VIEWS_RANGES) {
    const value = window[field];
    if (value === undefined) {
      continue;
    }
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ValidationError(field, `must be an integer between ${min} and ${max}`, value);
    }
    if (requires && window[requires] === undefined) {
      throw new ValidationError(field, `requires ${requires} to be set`, value);
    }
  }
}
