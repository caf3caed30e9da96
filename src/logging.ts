export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

type ConsoleSink = Pick<Console, "debug" | "info" | "warn" | "error">;

type FetchHandler = (request: Request) => Response | Promise<Response>;

export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createLogger(options: {
  debug?: boolean;
  sink?: ConsoleSink;
  now?: () => Date;
} = {}): Logger {
  const sink = options.sink ?? console;
  const debugEnabled = options.debug ?? false;
  const now = options.now ?? (() => new Date());

  const write = (level: keyof ConsoleSink, message: string, context?: LogContext) => {
    sink[level](`${now().toISOString()} ${level.toUpperCase()} ${formatMessage(message, context)}`);
  };

  return {
    debug: debugEnabled ? (message, context) => write("debug", message, context) : () => undefined,
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}

export function isDebugEnabled(value?: string): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function redactSecret(value: string | undefined): string {
  if (!value) return "<none>";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 4)}****`;
}

export function wrapFetchWithLogging(
  fetcher: FetchHandler,
  options: {
    logger: Logger;
    label: string;
    now?: () => number;
  }
): (request: Request) => Promise<Response> {
  const now = options.now ?? (() => Date.now());
  return async (request: Request) => {
    const start = now();
    const method = request.method;
    const url = stripSecretQuery(request.url);
    options.logger.debug("request_start", { label: options.label, method, url });
    try {
      const response = await fetcher(request);
      options.logger.debug("request_end", {
        label: options.label,
        method,
        url,
        status: response.status,
        durationMs: now() - start,
      });
      return response;
    } catch (error) {
      options.logger.error("request_error", {
        label: options.label,
        method,
        url,
        durationMs: now() - start,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  };
}

function stripSecretQuery(rawUrl: string): string {
  const url = new URL(rawUrl);
  for (const key of ["key", "code", "state"]) {
    if (url.searchParams.has(key)) {
      url.searchParams.set(key, "****");
    }
  }
  return url.toString();
}

function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${JSON.stringify(context)}`;
}
