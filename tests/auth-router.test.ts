import { describe, expect, it } from "vitest";

import { createAuthApp, escapeHtml } from "../src/auth/auth-router";
import type { AuthError, AuthStatus } from "../src/auth/authenticator";
import type { Credential } from "../src/auth/token-store";
import { authTransient, fail, ok, type RelayError, type Result } from "../src/errors";
import { credentialFor, FakeAuthenticator } from "./helpers/fake-authenticator";

class ScriptedAuthenticator extends FakeAuthenticator {
  exchangeResult: Result<Credential, AuthError> = ok({
    ...credentialFor("access-1"),
    email: "user@example.com",
  });
  logoutResult: Result<void, RelayError> = ok(undefined);
  currentStatus: AuthStatus = { authenticated: false };

  override async exchangeCode(code: string, state: string): Promise<Result<Credential, AuthError>> {
    await super.exchangeCode(code, state);
    return this.exchangeResult;
  }

  override status(): AuthStatus {
    return this.currentStatus;
  }

  override async logout(): Promise<Result<void, RelayError>> {
    return this.logoutResult;
  }
}

function setup() {
  const authenticator = new ScriptedAuthenticator();
  let logouts = 0;
  const app = createAuthApp({
    authenticator,
    onLogout: () => {
      logouts += 1;
    },
  });
  return { app, authenticator, logouts: () => logouts };
}

describe("createAuthApp", () => {
  it("redirects /login to the consent page", async () => {
    const { app } = setup();

    const response = await app.request("/login");

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("https://accounts.example.test/auth");
  });

  it("completes the callback and names the account", async () => {
    const { app, authenticator } = setup();

    const response = await app.request("/oauth2callback?code=auth-code&state=state-1");

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
    const html = await response.text();
    expect(html).toContain("<h1>Authentication complete</h1>");
    expect(html).toContain(
      "<p>Signed in as user@example.com. You can return to the CLI and close this window.</p>"
    );
    expect(authenticator.exchanges).toEqual([{ code: "auth-code", state: "state-1" }]);
  });

  it("returns 400 when the state does not match", async () => {
    const { app, authenticator } = setup();
    authenticator.exchangeResult = {
      ok: false,
      error: { code: "INVALID_STATE", message: "Invalid or expired OAuth state." },
    };

    const response = await app.request("/oauth2callback?code=auth-code&state=forged");

    expect(response.status).toBe(400);
    expect(await response.text()).toContain("<p>Invalid or expired OAuth state.</p>");
  });

  it("returns 500 when the token exchange fails", async () => {
    const { app, authenticator } = setup();
    authenticator.exchangeResult = {
      ok: false,
      error: { code: "TOKEN_EXCHANGE_FAILED", message: "Token exchange failed (400)" },
    };

    const response = await app.request("/oauth2callback?code=auth-code&state=state-1");

    expect(response.status).toBe(500);
  });

  it("reports a consent error from Google without exchanging", async () => {
    const { app, authenticator } = setup();

    const response = await app.request("/oauth2callback?error=access_denied");

    expect(response.status).toBe(400);
    expect(await response.text()).toContain("<p>Google returned: access_denied</p>");
    expect(authenticator.exchanges).toEqual([]);
  });

  it("requires both code and state", async () => {
    const { app } = setup();

    const response = await app.request("/oauth2callback?code=auth-code");

    expect(response.status).toBe(400);
    expect(await response.text()).toContain("<p>Missing required query parameters.</p>");
  });

  it("escapes provider text in the page", async () => {
    const { app } = setup();

    const response = await app.request(
      `/oauth2callback?error=${encodeURIComponent("<script>alert(1)</script>")}`
    );

    expect(await response.text()).toContain(
      "<p>Google returned: &lt;script&gt;alert(1)&lt;/script&gt;</p>"
    );
  });

  it("reports authentication status", async () => {
    const { app, authenticator } = setup();

    expect(await (await app.request("/auth/status")).json()).toEqual({ authenticated: false });

    authenticator.currentStatus = { authenticated: true, email: "user@example.com", expiresAt: 1 };
    expect(await (await app.request("/auth/status")).json()).toEqual({
      authenticated: true,
      email: "user@example.com",
    });
  });

  it("logs out and notifies the caller", async () => {
    const { app, logouts } = setup();

    const response = await app.request("/auth/logout", { method: "POST" });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ loggedOut: true });
    expect(logouts()).toBe(1);
  });

  it("reports a failed logout", async () => {
    const { app, authenticator, logouts } = setup();
    authenticator.logoutResult = fail(authTransient("Could not remove stored credential."));

    const response = await app.request("/auth/logout", { method: "POST" });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      loggedOut: false,
      message: "Could not remove stored credential.",
    });
    expect(logouts()).toBe(0);
  });

  it("answers unknown paths with JSON", async () => {
    const { app } = setup();

    const response = await app.request("/nope");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { code: 404, message: "Unknown endpoint" } });
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;"
    );
  });
});
