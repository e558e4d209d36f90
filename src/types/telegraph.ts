/**
 * Tags accepted by the Telegraph API inside page content.
 * https://telegra.ph/api#NodeElement
 */
export const ALLOWED_TAGS = [
  "a",
  "aside",
  "b",
  "blockquote",
  "br",
  "code",
  "em",
  "figcaption",
  "figure",
  "h3",
  "h4",
  "hr",
  "i",
  "iframe",
  "img",
  "li",
  "ol",
  "p",
  "pre",
  "s",
  "strong",
  "u",
  "ul",
  "video",
] as const;

export type AllowedTag = (typeof ALLOWED_TAGS)[number];

export type NodeAttribute = "href" | "src";

export type NodeAttributes = Partial<Record<NodeAttribute, string>>;

export interface NodeElement {
  tag: string;
  attrs?: NodeAttributes;
  children?: TelegraphNode[];
}

/**
 * A unit of page content: plain text or an element with children
 */
export type TelegraphNode = string | NodeElement;

export interface Account {
  shortName: string;
  authorName: string;
  authorUrl: string;
  /** Only returned by createAccount and revokeAccessToken */
  accessToken: string;
  /** One-time login link, valid for 5 minutes */
  authUrl: string;
  pageCount: number;
}

export interface Page {
  path: string;
  url: string;
  title: string;
  description: string;
  authorName: string;
  authorUrl: string;
  imageUrl: string;
  content: TelegraphNode[];
  views: number;
  canEdit: boolean;
}

export interface PageViews {
  views: number;
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
}

export type ViewsWindow = Omit<PageViews, "views">;

export type ContentType = "html" | "markdown" | "nodes";

export interface PageInput {
  title: string;
  content: string | TelegraphNode[];
  /** Defaults to "html" for string content and "nodes" for arrays */
  contentType?: ContentType;
  authorName?: string;
  authorUrl?: string;
  returnContent?: boolean;
}

export interface AccountInput {
  shortName: string;
  authorName?: string;
  authorUrl?: string;
}

export type AccountChanges = Partial<AccountInput>;

export type AccountField =
  | "short_name"
  | "author_name"
  | "author_url"
  | "auth_url"
  | "page_count";

export interface PageListOptions {
  offset?: number;
  limit?: number;
}

export interface GetPageOptions {
  returnContent?: boolean;
}

/**
 * Per-call options for methods scoped to an account
 */
export interface RequestOptions {
  /** Overrides the client's access token for this call */
  accessToken?: string;
}

export interface UploadFile {
  data: Uint8Array;
  filename: string;
  mimeType?: string;
}

export interface UploadResult {
  filename: string;
  size: number;
  success: boolean;
  url?: string;
  error?: Error;
}

export interface UploadProgress {
  completed: number;
  total: number;
  bytesSent: number;
  totalBytes: number;
  result: UploadResult;
}

export type UploadProgressCallback = (progress: UploadProgress) => void;

export interface UploadOptions {
  onProgress?: UploadProgressCallback;
}
