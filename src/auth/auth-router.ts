import { Hono } from "hono";

import { describeError } from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";
import type { Authenticator } from "./authenticator";

export type CreateAuthAppOptions = {
  authenticator: Authenticator;
  /** Runs after a successful logout, e.g. to drop onboarding state. */
  onLogout?: () => void;
  logger?: Logger;
};

export function createAuthApp(options: CreateAuthAppOptions): Hono {
  const { authenticator } = options;
  const logger = options.logger ?? NOOP_LOGGER;
  const app = new Hono();

  app.get("/login", (c) => {
    const result = authenticator.generateAuthUrl();
    if (!result.ok) {
      return c.html(renderAuthPage("Authentication failed", result.error.message), 500);
    }
    return c.redirect(result.value.url, 302);
  });

  app.get("/oauth2callback", async (c) => {
    const providerError = c.req.query("error");
    if (providerError) {
      return c.html(
        renderAuthPage("Authentication failed", `Google returned: ${providerError}`),
        400
      );
    }
    const code = c.req.query("code");
    const state = c.req.query("state");
    if (!code || !state) {
      return c.html(
        renderAuthPage("Authentication failed", "Missing required query parameters."),
        400
      );
    }

    const exchange = await authenticator.exchangeCode(code, state);
    if (!exchange.ok) {
      logger.warn("login_failed", { code: exchange.error.code, message: exchange.error.message });
      const status = exchange.error.code === "INVALID_STATE" ? 400 : 500;
      return c.html(renderAuthPage("Authentication failed", exchange.error.message), status);
    }

    const account = exchange.value.email ? ` as ${exchange.value.email}` : "";
    return c.html(
      renderAuthPage(
        "Authentication complete",
        `Signed in${account}. You can return to the CLI and close this window.`
      ),
      200
    );
  });

  app.get("/auth/status", (c) => {
    const status = authenticator.status();
    return c.json(
      status.email
        ? { authenticated: status.authenticated, email: status.email }
        : { authenticated: status.authenticated },
      200
    );
  });

  app.post("/auth/logout", async (c) => {
    const result = await authenticator.logout();
    if (!result.ok) {
      return c.json({ loggedOut: false, message: result.error.message }, 500);
    }
    options.onLogout?.();
    return c.json({ loggedOut: true }, 200);
  });

  app.notFound((c) => c.json({ error: { code: 404, message: "Unknown endpoint" } }, 404));

  app.onError((error, c) => {
    logger.error("unhandled_error", { message: describeError(error) });
    return c.json({ error: { code: 500, message: "Unexpected error occurred." } }, 500);
  });

  return app;
}

function renderAuthPage(title: string, message: string): string {
  const safeTitle = escapeHtml(title);
  const safeMessage = escapeHtml(message);
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${safeTitle}</title>
  </head>
  <body>
    <main>
      <h1>${safeTitle}</h1>
      <p>${safeMessage}</p>
    </main>
  </body>
</html>`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
