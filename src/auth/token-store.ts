import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ACCESS_TOKEN_SKEW_MS } from "../config/code-assist";
import type { Result } from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";

export type Credential = Readonly<{
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds. */
  expiresAt: number;
  scopes: readonly string[];
  email?: string;
}>;

export type CredentialSnapshot =
  | { status: "valid"; credential: Credential }
  | { status: "expired"; credential: Credential }
  | { status: "missing" };

export type TokenStoreError = {
  code: "IO_ERROR" | "INVALID_FORMAT";
  message: string;
  cause?: unknown;
};

export interface TokenStore {
  current(): CredentialSnapshot;
  replace(credential: Credential): Promise<Result<void, TokenStoreError>>;
  clear(): Promise<Result<void, TokenStoreError>>;
}

type TokenStoreOptions = {
  filePath: string;
  now?: () => number;
  skewMs?: number;
  logger?: Logger;
};

const StoredCredentialSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresAt: z.number().finite(),
  scopes: z.array(z.string()).default([]),
  email: z.string().optional(),
});

// Shape written by the Gemini CLI's own login (`oauth_creds.json`).
const CliCredentialSchema = z
  .object({
    access_token: z.string(),
    refresh_token: z.string(),
    expiry_date: z.number().finite(),
    scope: z.string().optional(),
  })
  .transform((value) => ({
    accessToken: value.access_token,
    refreshToken: value.refresh_token,
    expiresAt: value.expiry_date,
    scopes: value.scope ? value.scope.split(" ").filter(Boolean) : [],
  }));

const CredentialFileSchema = z.union([StoredCredentialSchema, CliCredentialSchema]);

/**
 * Holds the process-wide OAuth credential.
 *
 * The in-memory snapshot is a frozen object swapped in one assignment, so
 * readers always see a whole credential. Disk writes go through a single
 * promise chain and land atomically (temp file + rename).
 */
export class FileTokenStore implements TokenStore {
  private readonly filePath: string;
  private readonly now: () => number;
  private readonly skewMs: number;
  private readonly logger: Logger;
  private snapshot: Credential | null = null;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(options: TokenStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => Date.now());
    this.skewMs = options.skewMs ?? ACCESS_TOKEN_SKEW_MS;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  current(): CredentialSnapshot {
    return toSnapshot(this.snapshot, this.now(), this.skewMs);
  }

  async load(): Promise<Result<CredentialSnapshot, TokenStoreError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        this.snapshot = null;
        return { ok: true, value: { status: "missing" } };
      }
      return ioError("Failed to read credential file", error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return invalidFormat("Credential file is not valid JSON", error);
    }

    const credential = CredentialFileSchema.safeParse(parsed);
    if (!credential.success) {
      return invalidFormat("Credential file is missing required fields", credential.error);
    }
    this.snapshot = freezeCredential(credential.data);
    const snapshot = this.current();
    this.logger.info("credential_loaded", {
      status: snapshot.status,
      expiresAt: credential.data.expiresAt,
    });
    return { ok: true, value: snapshot };
  }

  async replace(credential: Credential): Promise<Result<void, TokenStoreError>> {
    const frozen = freezeCredential(credential);
    this.snapshot = frozen;
    return this.enqueueWrite(() => writeFileAtomic(this.filePath, serialize(frozen)));
  }

  async clear(): Promise<Result<void, TokenStoreError>> {
    this.snapshot = null;
    return this.enqueueWrite(() => fs.rm(this.filePath, { force: true }));
  }

  private enqueueWrite(
    write: () => Promise<void>
  ): Promise<Result<void, TokenStoreError>> {
    const next = this.writeChain.then(write);
    this.writeChain = next.catch(() => undefined);
    return next.then(
      (): Result<void, TokenStoreError> => ({ ok: true, value: undefined }),
      (error: unknown) => {
        this.logger.error("credential_persist_failed", {
          filePath: this.filePath,
          message: error instanceof Error ? error.message : String(error),
        });
        return ioError("Failed to persist credential", error);
      }
    );
  }
}

/** A store that never touches disk. */
export class MemoryTokenStore implements TokenStore {
  private snapshot: Credential | null;
  private readonly now: () => number;
  private readonly skewMs: number;

  constructor(options: { credential?: Credential; now?: () => number; skewMs?: number } = {}) {
    this.snapshot = options.credential ? freezeCredential(options.credential) : null;
    this.now = options.now ?? (() => Date.now());
    this.skewMs = options.skewMs ?? ACCESS_TOKEN_SKEW_MS;
  }

  current(): CredentialSnapshot {
    return toSnapshot(this.snapshot, this.now(), this.skewMs);
  }

  async replace(credential: Credential): Promise<Result<void, TokenStoreError>> {
    this.snapshot = freezeCredential(credential);
    return { ok: true, value: undefined };
  }

  async clear(): Promise<Result<void, TokenStoreError>> {
    this.snapshot = null;
    return { ok: true, value: undefined };
  }
}

function toSnapshot(
  credential: Credential | null,
  now: number,
  skewMs: number
): CredentialSnapshot {
  if (!credential) {
    return { status: "missing" };
  }
  if (credential.expiresAt - skewMs <= now) {
    return { status: "expired", credential };
  }
  return { status: "valid", credential };
}

function freezeCredential(credential: Credential): Credential {
  return Object.freeze({
    accessToken: credential.accessToken,
    refreshToken: credential.refreshToken,
    expiresAt: credential.expiresAt,
    scopes: Object.freeze([...credential.scopes]),
    ...(credential.email ? { email: credential.email } : {}),
  });
}

function serialize(credential: Credential): string {
  return JSON.stringify(credential, null, 2);
}

function ioError(message: string, cause: unknown): Result<never, TokenStoreError> {
  return { ok: false, error: { code: "IO_ERROR", message, cause } };
}

function invalidFormat(message: string, cause: unknown): Result<never, TokenStoreError> {
  return { ok: false, error: { code: "INVALID_FORMAT", message, cause } };
}

async function writeFileAtomic(targetPath: string, contents: string): Promise<void> {
  const dir = path.dirname(targetPath);
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  const tempPath = path.join(
    dir,
    `${path.basename(targetPath)}.tmp.${process.pid}.${randomBytes(8).toString("hex")}`
  );

  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(tempPath, "wx", 0o600);
    await handle.writeFile(contents, "utf8");
    await handle.sync();
  } finally {
    if (handle) {
      await handle.close();
    }
  }

  try {
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  if (process.platform !== "win32") {
    await fs.chmod(targetPath, 0o600);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
