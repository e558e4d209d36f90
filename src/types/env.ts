export interface Env {
  // Token used for account-scoped calls when none is passed explicitly
  TELEGRAPH_ACCESS_TOKEN?: string;
  // Telegraph domain, e.g. "telegra.ph" or a mirror
  TELEGRAPH_DOMAIN?: string;
  // Request timeout in milliseconds
  TELEGRAPH_TIMEOUT_MS?: string;
  // Environment mode, "production" silences debug logs
  NODE_ENV?: string;
  // debug | info | warn | error | silent
  LOG_LEVEL?: string;
}
