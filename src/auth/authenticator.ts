import { createHash, createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { z } from "zod";

import {
  DEFAULT_TOKEN_TIMEOUT_MS,
  OAUTH_SCOPES,
} from "../config/code-assist";
import type { EndpointRegistry } from "../config/endpoint-registry";
import {
  authExpired,
  authTransient,
  describeError,
  fail,
  ok,
  type RelayError,
  type Result,
} from "../errors";
import { NOOP_LOGGER, redactSecret, type Logger } from "../logging";
import { createDeadline } from "../utils/deadline";
import {
  InMemoryPendingAuthorizationStore,
  type PendingAuthorizationStore,
} from "./auth-session-store";
import type { Credential, TokenStore } from "./token-store";

export type AuthError = {
  code: "INVALID_STATE" | "TOKEN_EXCHANGE_FAILED" | "NETWORK_ERROR";
  message: string;
  cause?: unknown;
};

export type AuthStatus = {
  authenticated: boolean;
  email?: string;
  expiresAt?: number;
};

export type OAuthClientConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

export type AuthenticatorOptions = {
  registry: EndpointRegistry;
  tokenStore: TokenStore;
  client: OAuthClientConfig;
  scopes?: readonly string[];
  pendingStore?: PendingAuthorizationStore;
  fetch?: typeof fetch;
  now?: () => number;
  timeoutMs?: number;
  stateSecret?: string | Buffer;
  logger?: Logger;
};

export interface Authenticator {
  generateAuthUrl(): Result<{ url: string; state: string }, RelayError>;
  exchangeCode(code: string, state: string): Promise<Result<Credential, AuthError>>;
  ensureValid(): Promise<Result<Credential, RelayError>>;
  forceRefresh(staleAccessToken: string): Promise<Result<Credential, RelayError>>;
  status(): AuthStatus;
  isAuthenticated(): boolean;
  logout(): Promise<Result<void, RelayError>>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().finite(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

const UserInfoSchema = z.object({ email: z.string().optional() });

const OAuthErrorSchema = z.object({
  error: z
    .union([
      z.string(),
      z.object({
        code: z.union([z.string(), z.number()]).optional(),
        status: z.string().optional(),
        message: z.string().optional(),
      }),
    ])
    .optional(),
  error_description: z.string().optional(),
});

/**
 * OAuth session owner: runs the authorization-code login, and hands a valid
 * credential to every request, refreshing it at most once at a time.
 */
export class OAuthAuthenticator implements Authenticator {
  private readonly registry: EndpointRegistry;
  private readonly tokenStore: TokenStore;
  private readonly client: OAuthClientConfig;
  private readonly scopes: readonly string[];
  private readonly pendingStore: PendingAuthorizationStore;
  private readonly fetcher: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;
  private readonly stateSecret: Buffer;
  private readonly logger: Logger;
  private inflightRefresh: Promise<Result<Credential, RelayError>> | null = null;

  constructor(options: AuthenticatorOptions) {
    this.registry = options.registry;
    this.tokenStore = options.tokenStore;
    this.client = options.client;
    this.scopes = options.scopes ?? OAUTH_SCOPES;
    this.pendingStore = options.pendingStore ?? new InMemoryPendingAuthorizationStore();
    this.fetcher = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.now = options.now ?? (() => Date.now());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS;
    this.logger = options.logger ?? NOOP_LOGGER;

    if (options.stateSecret && options.stateSecret.length > 0) {
      this.stateSecret =
        typeof options.stateSecret === "string"
          ? Buffer.from(options.stateSecret, "utf8")
          : options.stateSecret;
    } else {
      this.logger.warn("state_secret_generated", {
        reason: "RELAY_STATE_SECRET is not set; login links do not survive a restart",
      });
      this.stateSecret = randomBytes(32);
    }
  }

  generateAuthUrl(): Result<{ url: string; state: string }, RelayError> {
    const endpoint = this.registry.resolve("oauth.authorize");
    if (!endpoint.ok) {
      return endpoint;
    }
    const { codeVerifier, codeChallenge } = generatePkce();
    const stateId = randomBytes(16).toString("hex");
    const state = `${stateId}.${signState(stateId, this.stateSecret)}`;
    this.pendingStore.save({
      stateId,
      codeVerifier,
      redirectUri: this.client.redirectUri,
      createdAt: this.now(),
    });

    const url = this.registry.url(endpoint.value, {
      client_id: this.client.clientId,
      response_type: "code",
      redirect_uri: this.client.redirectUri,
      scope: this.scopes.join(" "),
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
      state,
      access_type: "offline",
      prompt: "consent",
    });
    return ok({ url, state });
  }

  async exchangeCode(code: string, state: string): Promise<Result<Credential, AuthError>> {
    const stateId = verifyState(state, this.stateSecret);
    if (!stateId) {
      return exchangeFailed("INVALID_STATE", "Invalid OAuth state");
    }
    const pending = this.pendingStore.take(stateId);
    if (!pending) {
      return exchangeFailed("INVALID_STATE", "OAuth state expired");
    }
    const endpoint = this.registry.resolve("oauth.token");
    if (!endpoint.ok) {
      return exchangeFailed("TOKEN_EXCHANGE_FAILED", endpoint.error.message);
    }

    const deadline = createDeadline(this.timeoutMs);
    let payload: unknown;
    try {
      const response = await this.fetcher(endpoint.value.url, {
        method: endpoint.value.httpMethod,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          client_id: this.client.clientId,
          client_secret: this.client.clientSecret,
          code,
          grant_type: "authorization_code",
          redirect_uri: pending.redirectUri,
          code_verifier: pending.codeVerifier,
        }),
        signal: deadline.signal,
      });
      if (!response.ok) {
        const details = describeOAuthError(await readResponseText(response));
        return exchangeFailed(
          "TOKEN_EXCHANGE_FAILED",
          details
            ? `Token exchange failed (${response.status}) - ${details}`
            : `Token exchange failed (${response.status})`
        );
      }
      payload = await response.json();
    } catch (error) {
      return exchangeFailed(
        "NETWORK_ERROR",
        deadline.timedOut()
          ? "Token endpoint timed out"
          : "Failed to reach OAuth token endpoint",
        error
      );
    } finally {
      deadline.dispose();
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.refresh_token) {
      return exchangeFailed(
        "TOKEN_EXCHANGE_FAILED",
        "Token response is missing required fields"
      );
    }

    const credential: Credential = {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
      scopes: parsed.data.scope ? splitScopes(parsed.data.scope) : this.scopes,
      email: await this.fetchEmail(parsed.data.access_token),
    };
    const saved = await this.tokenStore.replace(credential);
    if (!saved.ok) {
      return exchangeFailed("TOKEN_EXCHANGE_FAILED", saved.error.message, saved.error);
    }
    this.logger.info("login_complete", { email: credential.email });
    return ok(credential);
  }

  async ensureValid(): Promise<Result<Credential, RelayError>> {
    const snapshot = this.tokenStore.current();
    switch (snapshot.status) {
      case "valid":
        return ok(snapshot.credential);
      case "missing":
        return fail(authExpired(this.loginRequiredMessage()));
      case "expired":
        return this.refresh(snapshot.credential);
    }
  }

  async forceRefresh(staleAccessToken: string): Promise<Result<Credential, RelayError>> {
    if (this.inflightRefresh) {
      return this.inflightRefresh;
    }
    const snapshot = this.tokenStore.current();
    if (snapshot.status === "missing") {
      return fail(authExpired(this.loginRequiredMessage()));
    }
    if (
      snapshot.status === "valid" &&
      snapshot.credential.accessToken !== staleAccessToken
    ) {
      return ok(snapshot.credential);
    }
    return this.refresh(snapshot.credential);
  }

  status(): AuthStatus {
    const snapshot = this.tokenStore.current();
    if (snapshot.status === "missing") {
      return { authenticated: false };
    }
    return {
      authenticated: snapshot.credential.refreshToken.length > 0,
      email: snapshot.credential.email,
      expiresAt: snapshot.credential.expiresAt,
    };
  }

  isAuthenticated(): boolean {
    return this.status().authenticated;
  }

  async logout(): Promise<Result<void, RelayError>> {
    const snapshot = this.tokenStore.current();
    if (snapshot.status !== "missing") {
      await this.revoke(snapshot.credential.refreshToken);
    }
    const cleared = await this.tokenStore.clear();
    if (!cleared.ok) {
      return fail(authTransient(cleared.error.message, cleared.error));
    }
    this.logger.info("logout_complete");
    return ok(undefined);
  }

  private refresh(credential: Credential): Promise<Result<Credential, RelayError>> {
    if (this.inflightRefresh) {
      return this.inflightRefresh;
    }
    const pending = this.performRefresh(credential).finally(() => {
      this.inflightRefresh = null;
    });
    this.inflightRefresh = pending;
    return pending;
  }

  private async performRefresh(
    credential: Credential
  ): Promise<Result<Credential, RelayError>> {
    if (!credential.refreshToken.trim()) {
      return fail(authExpired(this.loginRequiredMessage()));
    }
    const endpoint = this.registry.resolve("oauth.token");
    if (!endpoint.ok) {
      return endpoint;
    }

    this.logger.info("token_refresh_start", {
      token: redactSecret(credential.accessToken),
      expiresAt: credential.expiresAt,
    });
    const deadline = createDeadline(this.timeoutMs);
    let payload: unknown;
    try {
      const response = await this.fetcher(endpoint.value.url, {
        method: endpoint.value.httpMethod,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          refresh_token: credential.refreshToken,
          client_id: this.client.clientId,
          client_secret: this.client.clientSecret,
        }),
        signal: deadline.signal,
      });

      if (!response.ok) {
        const details = describeOAuthError(await readResponseText(response));
        const message = details
          ? `Token refresh failed (${response.status}) - ${details}`
          : `Token refresh failed (${response.status})`;
        this.logger.error("token_refresh_failed", { status: response.status, message });
        if (response.status >= 500 || response.status === 429) {
          return fail(authTransient(message));
        }
        return fail(authExpired(`${message}. ${this.loginRequiredMessage()}`));
      }
      payload = await response.json();
    } catch (error) {
      const message = deadline.timedOut()
        ? `Token refresh timed out after ${this.timeoutMs}ms`
        : `Failed to reach token endpoint: ${describeError(error)}`;
      this.logger.error("token_refresh_failed", { message });
      return fail(authTransient(message, error));
    } finally {
      deadline.dispose();
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.error("token_refresh_failed", { message: "invalid token response" });
      return fail(authTransient("Token endpoint returned an invalid response"));
    }

    const refreshed: Credential = {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token ?? credential.refreshToken,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
      scopes: parsed.data.scope ? splitScopes(parsed.data.scope) : credential.scopes,
      email: credential.email,
    };
    const saved = await this.tokenStore.replace(refreshed);
    if (!saved.ok) {
      this.logger.warn("token_refresh_not_persisted", { message: saved.error.message });
    }
    this.logger.info("token_refresh_success", { expiresAt: refreshed.expiresAt });
    return ok(refreshed);
  }

  private async fetchEmail(accessToken: string): Promise<string | undefined> {
    const endpoint = this.registry.resolve("oauth.userinfo");
    if (!endpoint.ok) {
      return undefined;
    }
    const deadline = createDeadline(this.timeoutMs);
    try {
      const response = await this.fetcher(endpoint.value.url, {
        method: endpoint.value.httpMethod,
        headers: { Authorization: `Bearer ${accessToken}` },
        signal: deadline.signal,
      });
      if (!response.ok) {
        this.logger.warn("userinfo_failed", { status: response.status });
        return undefined;
      }
      const parsed = UserInfoSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.email : undefined;
    } catch (error) {
      this.logger.warn("userinfo_failed", { message: describeError(error) });
      return undefined;
    } finally {
      deadline.dispose();
    }
  }

  private async revoke(token: string): Promise<void> {
    const endpoint = this.registry.resolve("oauth.revoke");
    if (!endpoint.ok || !token) {
      return;
    }
    const deadline = createDeadline(this.timeoutMs);
    try {
      const response = await this.fetcher(endpoint.value.url, {
        method: endpoint.value.httpMethod,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ token }),
        signal: deadline.signal,
      });
      if (!response.ok) {
        this.logger.warn("token_revoke_failed", { status: response.status });
      }
    } catch (error) {
      this.logger.warn("token_revoke_failed", { message: describeError(error) });
    } finally {
      deadline.dispose();
    }
  }

  private loginRequiredMessage(): string {
    return `Authentication required. Visit ${new URL("/login", this.client.redirectUri).toString()} to sign in.`;
  }
}

function generatePkce(): { codeVerifier: string; codeChallenge: string } {
  const codeVerifier = randomBytes(32).toString("base64url");
  const codeChallenge = createHash("sha256").update(codeVerifier).digest("base64url");
  return { codeVerifier, codeChallenge };
}

function signState(stateId: string, secret: Buffer): string {
  return createHmac("sha256", secret).update(stateId).digest("base64url");
}

function verifyState(state: string, secret: Buffer): string | null {
  const [stateId, signature, ...rest] = state.split(".");
  if (!stateId || !signature || rest.length > 0) {
    return null;
  }
  const expected = Buffer.from(signState(stateId, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return null;
  }
  return stateId;
}

function splitScopes(scope: string): string[] {
  return scope.split(" ").filter(Boolean);
}

function exchangeFailed(
  code: AuthError["code"],
  message: string,
  cause?: unknown
): Result<never, AuthError> {
  return { ok: false, error: { code, message, cause } };
}

export function describeOAuthError(text?: string): string | undefined {
  if (!text) {
    return undefined;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return text;
  }
  const parsed = OAuthErrorSchema.safeParse(json);
  if (!parsed.success) {
    return text;
  }

  const { error, error_description: description } = parsed.data;
  let code: string | undefined;
  let message = description;
  if (typeof error === "string") {
    code = error;
  } else if (error) {
    code = error.status ?? (error.code === undefined ? undefined : String(error.code));
    message = message ?? error.message;
  }
  const details = [code, message].filter(Boolean).join(": ");
  return details || undefined;
}

async function readResponseText(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}
