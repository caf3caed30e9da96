import os from "node:os";
import path from "node:path";
import { z } from "zod";

import {
  CODE_ASSIST_ENDPOINT_PROD,
  DEFAULT_ONBOARDING_TIMEOUT_MS,
  DEFAULT_TOKEN_TIMEOUT_MS,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
} from "./code-assist";
import { isDebugEnabled } from "../logging";

export type Env = Record<string, string | undefined>;

const DEFAULT_TOKEN_PATH = path.join(
  os.homedir(),
  ".code-assist-relay",
  "credentials.json"
);

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const port = (fallback: number) =>
  z.coerce.number().int().min(1).max(65_535).default(fallback);

const timeout = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const SettingsSchema = z.object({
  RELAY_OAUTH_CLIENT_ID: z
    .string({ required_error: "RELAY_OAUTH_CLIENT_ID is required" })
    .trim()
    .min(1, "RELAY_OAUTH_CLIENT_ID is required"),
  RELAY_OAUTH_CLIENT_SECRET: z
    .string({ required_error: "RELAY_OAUTH_CLIENT_SECRET is required" })
    .trim()
    .min(1, "RELAY_OAUTH_CLIENT_SECRET is required"),
  RELAY_PROJECT_ID: optionalString,
  RELAY_TOKEN_PATH: optionalString,
  RELAY_STATE_SECRET: optionalString,
  RELAY_API_KEY: optionalString,
  RELAY_PROXY_PORT: port(8000),
  RELAY_PROXY_HOST: z.string().trim().min(1).default("127.0.0.1"),
  RELAY_AUTH_PORT: port(8085),
  RELAY_AUTH_HOST: z.string().trim().min(1).default("127.0.0.1"),
  RELAY_CODE_ASSIST_BASE_URL: z
    .string()
    .trim()
    .url()
    .default(CODE_ASSIST_ENDPOINT_PROD)
    .transform((value) => value.replace(/\/+$/, "")),
  RELAY_TOKEN_TIMEOUT_MS: timeout(DEFAULT_TOKEN_TIMEOUT_MS),
  RELAY_ONBOARDING_TIMEOUT_MS: timeout(DEFAULT_ONBOARDING_TIMEOUT_MS),
  RELAY_UPSTREAM_TIMEOUT_MS: timeout(DEFAULT_UPSTREAM_TIMEOUT_MS),
  RELAY_ADDITIONAL_MODELS: optionalString,
  RELAY_DEBUG_LOGS: optionalString,
});

export type Settings = {
  oauth: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
  };
  tenantId?: string;
  tokenPath: string;
  stateSecret?: string;
  apiKey?: string;
  proxy: { port: number; hostname: string };
  auth: { port: number; hostname: string };
  codeAssistBaseUrl: string;
  timeouts: {
    tokenMs: number;
    onboardingMs: number;
    upstreamMs: number;
  };
  additionalModels: string[];
  debug: boolean;
};

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

export function loadSettings(env: Env = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }
  const values = parsed.data;
  return {
    oauth: {
      clientId: values.RELAY_OAUTH_CLIENT_ID,
      clientSecret: values.RELAY_OAUTH_CLIENT_SECRET,
      redirectUri: `http://localhost:${values.RELAY_AUTH_PORT}/oauth2callback`,
    },
    tenantId: values.RELAY_PROJECT_ID,
    tokenPath: values.RELAY_TOKEN_PATH ?? DEFAULT_TOKEN_PATH,
    stateSecret: values.RELAY_STATE_SECRET,
    apiKey: values.RELAY_API_KEY,
    proxy: { port: values.RELAY_PROXY_PORT, hostname: values.RELAY_PROXY_HOST },
    auth: { port: values.RELAY_AUTH_PORT, hostname: values.RELAY_AUTH_HOST },
    codeAssistBaseUrl: values.RELAY_CODE_ASSIST_BASE_URL,
    timeouts: {
      tokenMs: values.RELAY_TOKEN_TIMEOUT_MS,
      onboardingMs: values.RELAY_ONBOARDING_TIMEOUT_MS,
      upstreamMs: values.RELAY_UPSTREAM_TIMEOUT_MS,
    },
    additionalModels: parseModelList(values.RELAY_ADDITIONAL_MODELS),
    debug: isDebugEnabled(values.RELAY_DEBUG_LOGS),
  };
}

export function parseModelList(value: string | undefined): string[] {
  if (!value) return [];
  const seen = new Set<string>();
  for (const item of value.split(",")) {
    const id = item.trim();
    if (id) {
      seen.add(id);
    }
  }
  return [...seen];
}
