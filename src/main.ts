import { pathToFileURL } from "node:url";
import type { Hono } from "hono";

import { createAuthApp } from "./auth/auth-router";
import { OAuthAuthenticator } from "./auth/authenticator";
import { FileTokenStore } from "./auth/token-store";
import { createEndpointRegistry } from "./config/endpoint-registry";
import { createModelCatalog } from "./config/model-catalog";
import { loadSettings, type Env, type Settings } from "./config/settings";
import { describeError } from "./errors";
import { createLogger, NOOP_LOGGER, type Logger, wrapFetchWithLogging } from "./logging";
import { CodeAssistOnboardingCoordinator } from "./onboarding/onboarding-coordinator";
import { createCodeAssistClient } from "./proxy/code-assist-client";
import { ProxyDispatcher } from "./proxy/dispatcher";
import { createProxyApp } from "./proxy/proxy-router";
import {
  closeServer,
  startServer,
  type RunningServer,
  type ServeOptions,
} from "./server";

export const STARTUP_BANNER = "code-assist-relay";

type Serve = (options: ServeOptions) => RunningServer;

export type StartServersOptions = {
  authApp: Hono;
  proxyApp: Hono;
  settings: Pick<Settings, "auth" | "proxy" | "debug">;
  logger?: Logger;
  serve?: Serve;
  onSignal?: (signal: "SIGINT" | "SIGTERM", handler: () => void) => void;
};

export function createAppContext(
  settings: Settings,
  options: { logger?: Logger; fetch?: typeof fetch } = {}
) {
  const logger = options.logger ?? NOOP_LOGGER;
  const registry = createEndpointRegistry({ codeAssistBaseUrl: settings.codeAssistBaseUrl });
  const tokenStore = new FileTokenStore({ filePath: settings.tokenPath, logger });
  const authenticator = new OAuthAuthenticator({
    registry,
    tokenStore,
    client: settings.oauth,
    fetch: options.fetch,
    timeoutMs: settings.timeouts.tokenMs,
    stateSecret: settings.stateSecret,
    logger,
  });
  const client = createCodeAssistClient({ registry, fetch: options.fetch, logger });
  const onboarding = new CodeAssistOnboardingCoordinator({
    authenticator,
    client,
    timeoutMs: settings.timeouts.onboardingMs,
    logger,
  });
  const dispatcher = new ProxyDispatcher({
    authenticator,
    onboarding,
    client,
    registry,
    tenantId: settings.tenantId,
    timeoutMs: settings.timeouts.upstreamMs,
    logger,
  });

  const authApp = createAuthApp({
    authenticator,
    onLogout: () => onboarding.invalidate(),
    logger,
  });
  const proxyApp = createProxyApp({
    dispatcher,
    modelCatalog: createModelCatalog({
      additionalModelIds: settings.additionalModels,
      logger,
    }),
    apiKey: settings.apiKey,
    logger,
  });

  return { authApp, proxyApp, tokenStore, authenticator, onboarding, dispatcher };
}

export function startServers(options: StartServersOptions) {
  const logger = options.logger ?? NOOP_LOGGER;
  const onSignal = options.onSignal ?? ((signal, handler) => process.on(signal, handler));
  const serveFor = (label: string): Serve | undefined =>
    options.settings.debug ? withRequestLogging(options.serve, logger, label) : options.serve;

  const authServer = startServer({
    fetch: options.authApp.fetch,
    ...options.settings.auth,
    serve: serveFor("auth"),
  });
  logger.info("server_start", { service: "auth", ...options.settings.auth });
  const proxyServer = startServer({
    fetch: options.proxyApp.fetch,
    ...options.settings.proxy,
    serve: serveFor("proxy"),
  });
  logger.info("server_start", { service: "proxy", ...options.settings.proxy });

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (shutdownPromise) {
      return shutdownPromise;
    }
    logger.info("server_shutdown_start");
    shutdownPromise = Promise.all([closeServer(authServer), closeServer(proxyServer)]).then(
      () => logger.info("server_shutdown_complete"),
      (error: unknown) => logger.error("server_shutdown_failed", { message: describeError(error) })
    );
    return shutdownPromise;
  };

  const onShutdownSignal = () => {
    void shutdown();
  };
  onSignal("SIGINT", onShutdownSignal);
  onSignal("SIGTERM", onShutdownSignal);

  return { authServer, proxyServer, shutdown };
}

export async function startApplication(
  options: Pick<StartServersOptions, "logger" | "serve" | "onSignal"> & { env?: Env } = {}
) {
  const settings = loadSettings(options.env);
  const logger = options.logger ?? createLogger({ debug: settings.debug });
  logger.info(STARTUP_BANNER, { status: "starting" });

  const context = createAppContext(settings, { logger });
  const loaded = await context.tokenStore.load();
  if (!loaded.ok) {
    logger.error("credential_load_failed", {
      code: loaded.error.code,
      message: loaded.error.message,
      tokenPath: settings.tokenPath,
    });
  } else if (loaded.value.status === "missing") {
    logger.warn("credential_missing", {
      login: new URL("/login", settings.oauth.redirectUri).toString(),
    });
  }

  return startServers({
    authApp: context.authApp,
    proxyApp: context.proxyApp,
    settings,
    logger,
    serve: options.serve,
    onSignal: options.onSignal,
  });
}

function withRequestLogging(serve: Serve | undefined, logger: Logger, label: string): Serve {
  return (serveOptions) =>
    startServer({
      ...serveOptions,
      fetch: wrapFetchWithLogging(serveOptions.fetch, { logger, label }),
      serve,
    });
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  startApplication().catch((error: unknown) => {
    console.error("startup_failed", { error: describeError(error) });
    process.exitCode = 1;
  });
}
