import { describe, expect, it } from "vitest";

import { createLogger, isDebugEnabled, redactSecret, wrapFetchWithLogging } from "../src/logging";
import { createCaptureLogger } from "./helpers/capture-logger";

function createSink() {
  const lines: Array<{ level: string; line: string }> = [];
  const write = (level: string) => (line: string) => {
    lines.push({ level, line });
  };
  return {
    lines,
    sink: { debug: write("debug"), info: write("info"), warn: write("warn"), error: write("error") },
  };
}

const now = () => new Date("2026-01-01T00:00:00.000Z");

describe("createLogger", () => {
  it("writes a timestamp, level, message and JSON context", () => {
    const { lines, sink } = createSink();
    const logger = createLogger({ sink, now });

    logger.info("server_start", { service: "proxy", port: 8000 });
    logger.warn("credential_missing");

    expect(lines).toEqual([
      {
        level: "info",
        line: '2026-01-01T00:00:00.000Z INFO server_start {"service":"proxy","port":8000}',
      },
      { level: "warn", line: "2026-01-01T00:00:00.000Z WARN credential_missing" },
    ]);
  });

  it("drops debug entries unless debug is enabled", () => {
    const quiet = createSink();
    const verbose = createSink();

    createLogger({ sink: quiet.sink, now }).debug("request_start");
    createLogger({ sink: verbose.sink, now, debug: true }).debug("request_start");

    expect(quiet.lines).toEqual([]);
    expect(verbose.lines).toEqual([
      { level: "debug", line: "2026-01-01T00:00:00.000Z DEBUG request_start" },
    ]);
  });
});

describe("isDebugEnabled", () => {
  it("accepts the usual truthy spellings", () => {
    expect(["1", "true", " YES ", "on"].map(isDebugEnabled)).toEqual([true, true, true, true]);
    expect(["0", "false", "", undefined].map((value) => isDebugEnabled(value))).toEqual([
      false,
      false,
      false,
      false,
    ]);
  });
});

describe("redactSecret", () => {
  it("keeps only a short prefix", () => {
    expect(redactSecret(undefined)).toBe("<none>");
    expect(redactSecret("short")).toBe("****");
    expect(redactSecret("ya29.placeholder-token")).toBe("ya29****");
  });
});

describe("wrapFetchWithLogging", () => {
  it("logs start and end with the duration and masks secrets in the URL", async () => {
    const logger = createCaptureLogger();
    let clock = 100;
    const fetcher = wrapFetchWithLogging(
      async () => {
        clock += 25;
        return new Response("ok", { status: 201 });
      },
      { logger, label: "auth", now: () => clock }
    );

    const response = await fetcher(
      new Request("http://localhost:8085/oauth2callback?code=test-code&state=test-state")
    );

    expect(response.status).toBe(201);
    expect(logger.entries).toEqual([
      {
        level: "debug",
        message: "request_start",
        context: {
          label: "auth",
          method: "GET",
          url: "http://localhost:8085/oauth2callback?code=****&state=****",
        },
      },
      {
        level: "debug",
        message: "request_end",
        context: {
          label: "auth",
          method: "GET",
          url: "http://localhost:8085/oauth2callback?code=****&state=****",
          status: 201,
          durationMs: 25,
        },
      },
    ]);
  });

  it("logs and rethrows handler errors", async () => {
    const logger = createCaptureLogger();
    const fetcher = wrapFetchWithLogging(
      () => {
        throw new Error("handler exploded");
      },
      { logger, label: "proxy", now: () => 0 }
    );

    await expect(fetcher(new Request("http://localhost:8000/v1beta/models", { method: "POST" }))).rejects.toThrow(
      "handler exploded"
    );
    expect(logger.entries.at(-1)).toEqual({
      level: "error",
      message: "request_error",
      context: {
        label: "proxy",
        method: "POST",
        url: "http://localhost:8000/v1beta/models",
        durationMs: 0,
        message: "handler exploded",
      },
    });
  });
});
