import { z } from "zod";

import type { Authenticator } from "../auth/authenticator";
import {
  CODE_ASSIST_METADATA,
  DEFAULT_ONBOARDING_TIMEOUT_MS,
  FREE_TIER_ID,
  ONBOARDING_MAX_ATTEMPTS,
  ONBOARDING_POLL_INTERVAL_MS,
} from "../config/code-assist";
import type { OperationName } from "../config/endpoint-registry";
import { fail, ok, onboardingFailed, type RelayError, type Result } from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";
import type { CallFailure, CodeAssistClient } from "../proxy/code-assist-client";
import { defaultSleep } from "../utils/deadline";

export type TenantOnboardingState = Readonly<{
  tenantId: string | undefined;
  onboarded: true;
  projectId: string;
  tierId?: string;
}>;

export interface OnboardingCoordinator {
  ensureOnboarded(tenantId?: string): Promise<Result<TenantOnboardingState, RelayError>>;
  invalidate(tenantId?: string): void;
}

export type OnboardingCoordinatorOptions = {
  authenticator: Authenticator;
  client: CodeAssistClient;
  timeoutMs?: number;
  maxAttempts?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const ProjectSchema = z.union([z.string(), z.object({ id: z.string().optional() })]);

const LoadCodeAssistSchema = z.object({
  currentTier: z.object({ id: z.string().optional() }).nullish(),
  allowedTiers: z
    .array(
      z.object({
        id: z.string().optional(),
        isDefault: z.boolean().optional(),
        userDefinedCloudaicompanionProject: z.boolean().optional(),
      })
    )
    .optional(),
  cloudaicompanionProject: ProjectSchema.nullish(),
});

const OnboardOperationSchema = z.object({
  done: z.boolean().optional(),
  response: z
    .object({ cloudaicompanionProject: ProjectSchema.nullish() })
    .nullish(),
});

type LoadCodeAssistResponse = z.infer<typeof LoadCodeAssistSchema>;

// Free-tier accounts are served without a user-owned project.
const DEFAULT_TENANT_KEY = "<default>";

/**
 * Makes sure the signed-in account is provisioned for Code Assist before any
 * generation call, and remembers the project it was given.
 */
export class CodeAssistOnboardingCoordinator implements OnboardingCoordinator {
  private readonly authenticator: Authenticator;
  private readonly client: CodeAssistClient;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly onboarded = new Map<string, TenantOnboardingState>();
  private readonly pending = new Map<
    string,
    Promise<Result<TenantOnboardingState, RelayError>>
  >();
  // Bumped by invalidate so an attempt started before it is never cached.
  private generation = 0;

  constructor(options: OnboardingCoordinatorOptions) {
    this.authenticator = options.authenticator;
    this.client = options.client;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ONBOARDING_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? ONBOARDING_MAX_ATTEMPTS;
    this.pollIntervalMs = options.pollIntervalMs ?? ONBOARDING_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  ensureOnboarded(tenantId?: string): Promise<Result<TenantOnboardingState, RelayError>> {
    const key = tenantId ?? DEFAULT_TENANT_KEY;
    const cached = this.onboarded.get(key);
    if (cached) {
      return Promise.resolve(ok(cached));
    }
    const inflight = this.pending.get(key);
    if (inflight) {
      return inflight;
    }

    const generation = this.generation;
    const attempt = this.onboard(tenantId)
      .then((result) => {
        if (result.ok && generation === this.generation) {
          this.onboarded.set(key, result.value);
        }
        return result;
      })
      .finally(() => {
        if (this.pending.get(key) === attempt) {
          this.pending.delete(key);
        }
      });
    this.pending.set(key, attempt);
    return attempt;
  }

  invalidate(tenantId?: string): void {
    this.generation += 1;
    if (tenantId === undefined) {
      this.onboarded.clear();
      this.pending.clear();
      return;
    }
    this.onboarded.delete(tenantId);
    this.pending.delete(tenantId);
  }

  private async onboard(
    tenantId: string | undefined
  ): Promise<Result<TenantOnboardingState, RelayError>> {
    const credential = await this.authenticator.ensureValid();
    if (!credential.ok) {
      return credential;
    }
    const accessToken = credential.value.accessToken;
    this.logger.info("onboarding_start", { tenantId });

    const loaded = await this.loadCodeAssist(accessToken, tenantId);
    if (!loaded.ok) {
      return loaded;
    }
    if (loaded.value.currentTier) {
      return this.complete(tenantId, loaded.value.currentTier.id, [
        loaded.value.cloudaicompanionProject,
      ]);
    }

    const tier = loaded.value.allowedTiers?.find((candidate) => candidate.isDefault);
    const tierId = tier?.id ?? FREE_TIER_ID;
    if (tierId !== FREE_TIER_ID && !tenantId) {
      return fail(
        onboardingFailed(
          `tier "${tierId}" requires a Google Cloud project; set RELAY_PROJECT_ID`
        )
      );
    }

    const body = {
      tierId,
      // The free tier provisions its own managed project.
      cloudaicompanionProject: tierId === FREE_TIER_ID ? undefined : tenantId,
      metadata: { ...CODE_ASSIST_METADATA, duetProject: tenantId },
    };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const call = await this.postJson("codeAssist.onboardUser", accessToken, body);
      if (!call.ok) {
        if (isAlreadyOnboarded(call.error)) {
          this.logger.info("onboarding_already_exists", { tenantId });
          const reloaded = await this.loadCodeAssist(accessToken, tenantId);
          return this.complete(tenantId, tierId, [
            reloaded.ok ? reloaded.value.cloudaicompanionProject : undefined,
          ]);
        }
        return fail(callFailureToOnboarding(call.error));
      }

      const operation = OnboardOperationSchema.safeParse(call.value);
      if (!operation.success) {
        return fail(onboardingFailed("onboardUser returned an unexpected response"));
      }
      if (operation.data.done) {
        return this.complete(tenantId, tierId, [
          operation.data.response?.cloudaicompanionProject,
          loaded.value.cloudaicompanionProject,
        ]);
      }

      this.logger.debug("onboarding_pending", { tenantId, attempt });
      if (attempt < this.maxAttempts) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    this.logger.warn("onboarding_incomplete", { tenantId, attempts: this.maxAttempts });
    return fail(
      onboardingFailed(`onboarding did not complete after ${this.maxAttempts} attempts`)
    );
  }

  private async loadCodeAssist(
    accessToken: string,
    tenantId: string | undefined
  ): Promise<Result<LoadCodeAssistResponse, RelayError>> {
    const call = await this.postJson("codeAssist.loadCodeAssist", accessToken, {
      cloudaicompanionProject: tenantId,
      metadata: { ...CODE_ASSIST_METADATA, duetProject: tenantId },
    });
    if (!call.ok) {
      return fail(callFailureToOnboarding(call.error));
    }
    const parsed = LoadCodeAssistSchema.safeParse(call.value);
    if (!parsed.success) {
      return fail(onboardingFailed("loadCodeAssist returned an unexpected response"));
    }
    return ok(parsed.data);
  }

  private async postJson(
    operation: OperationName,
    accessToken: string,
    body: unknown
  ): Promise<Result<unknown, CallFailure>> {
    const call = await this.client.call(operation, {
      accessToken,
      body,
      timeoutMs: this.timeoutMs,
    });
    if (!call.ok) {
      return call;
    }
    try {
      return ok(await call.value.response.json());
    } catch (error) {
      return {
        ok: false,
        error: { kind: "network", message: `${operation} returned invalid JSON`, cause: error },
      };
    } finally {
      call.value.release();
    }
  }

  private complete(
    tenantId: string | undefined,
    tierId: string | undefined,
    projects: ReadonlyArray<z.infer<typeof ProjectSchema> | null | undefined>
  ): Result<TenantOnboardingState, RelayError> {
    const projectId = projects.map(projectIdOf).find(Boolean) ?? tenantId;
    if (!projectId) {
      return fail(
        onboardingFailed("no Code Assist project was assigned; set RELAY_PROJECT_ID")
      );
    }
    const state: TenantOnboardingState = Object.freeze({
      tenantId,
      onboarded: true,
      projectId,
      tierId,
    });
    this.logger.info("onboarding_complete", { tenantId, projectId, tierId });
    return ok(state);
  }
}

function projectIdOf(
  project: z.infer<typeof ProjectSchema> | null | undefined
): string | undefined {
  if (!project) {
    return undefined;
  }
  return typeof project === "string" ? project : project.id;
}

function isAlreadyOnboarded(failure: CallFailure): boolean {
  return (
    failure.kind === "http" &&
    (failure.status === 409 || failure.error.upstreamStatus === "ALREADY_EXISTS")
  );
}

function callFailureToOnboarding(failure: CallFailure): RelayError {
  switch (failure.kind) {
    case "unknown_operation":
      return failure.error;
    case "timeout":
      return onboardingFailed(`timed out after ${failure.timeoutMs}ms`);
    case "aborted":
      return onboardingFailed("request was cancelled");
    case "network":
      return onboardingFailed(failure.message, failure.cause);
    case "http":
      return onboardingFailed(`${failure.error.message} (${failure.status})`, failure.error);
  }
}
