export const GOOGLE_OAUTH_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_OAUTH_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const GOOGLE_OAUTH_REVOKE_URL = "https://oauth2.googleapis.com/revoke";
export const GOOGLE_USERINFO_URL = "https://www.googleapis.com/oauth2/v2/userinfo";

export const CODE_ASSIST_ENDPOINT_PROD = "https://cloudcode-pa.googleapis.com";

// The Code Assist routes live under the internal API version. The public
// `v1` onboarding route exists but does not provision the tenant.
export const CODE_ASSIST_API_VERSION = "v1internal";

// Tokens are treated as expired this long before their stated expiry so a
// token cannot lapse while a request is in flight.
export const ACCESS_TOKEN_SKEW_MS = 30 * 1000;

export const DEFAULT_TOKEN_TIMEOUT_MS = 15 * 1000;
export const DEFAULT_ONBOARDING_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 5 * 60 * 1000;

export const ONBOARDING_MAX_ATTEMPTS = 10;
export const ONBOARDING_POLL_INTERVAL_MS = 5 * 1000;

export const FREE_TIER_ID = "free-tier";

export const OAUTH_SCOPES: readonly string[] = [
  "https://www.googleapis.com/auth/cloud-platform",
  "https://www.googleapis.com/auth/userinfo.email",
  "https://www.googleapis.com/auth/userinfo.profile",
];

export const CODE_ASSIST_METADATA = {
  ideType: "IDE_UNSPECIFIED",
  platform: "PLATFORM_UNSPECIFIED",
  pluginType: "GEMINI",
} as const;

export const CODE_ASSIST_HEADERS = {
  "User-Agent": "google-api-nodejs-client/9.15.1",
  "X-Goog-Api-Client": "gl-node/20.18.0",
  "Client-Metadata":
    "ideType=IDE_UNSPECIFIED,platform=PLATFORM_UNSPECIFIED,pluginType=GEMINI",
} as const;

export const DEFAULT_MODEL_IDS: readonly string[] = [
  "gemini-2.5-pro",
  "gemini-2.5-flash",
  "gemini-2.5-flash-lite",
];
