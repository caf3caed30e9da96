import {
  describeError,
  malformedUpstreamResponse,
  upstreamError,
  type RelayError,
} from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";
import { encodeSseError } from "./gemini-error";
import { decodeRaw, fromRaw } from "./response";

const EXCERPT_LENGTH = 200;

export type StreamTranslator = {
  /** Returns Gemini SSE text for every event completed by `text`. */
  push: (text: string) => string;
  /**
   * Flushes a trailing event that had no blank-line terminator. A stream that
   * never carried a response ends with an error event.
   */
  finish: () => string;
  /** True after an error event was emitted or `finish` ran. */
  readonly ended: boolean;
};

export function createStreamTranslator(options: { logger?: Logger } = {}): StreamTranslator {
  const logger = options.logger ?? NOOP_LOGGER;
  let buffer = "";
  let ended = false;
  let translatedAny = false;

  const emitError = (error: RelayError, excerpt: string): string => {
    ended = true;
    if (error.code === "MALFORMED_UPSTREAM_RESPONSE") {
      logger.error("malformed_upstream_response", {
        operation: "codeAssist.streamGenerateContent",
        message: error.message,
        excerpt: excerpt.slice(0, EXCERPT_LENGTH),
      });
    } else {
      logger.warn("stream_upstream_error", { status: error.statusCode, message: error.message });
    }
    return encodeSseError(error);
  };

  const translatePayload = (payload: unknown, excerpt: string): string => {
    const decoded = decodeRaw("streamGenerateContent", payload);
    const translated = decoded.ok ? fromRaw(decoded.value) : decoded;
    if (!translated.ok) {
      return emitError(translated.error, excerpt);
    }
    translatedAny = true;
    return `data: ${JSON.stringify(translated.value)}\n\n`;
  };

  // A body that is not an event stream, such as a plain JSON error sent with 200.
  const translateBareBody = (text: string): string => {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      return emitError(
        malformedUpstreamResponse("$", "stream body is not server-sent events"),
        text
      );
    }
    if (Array.isArray(payload) && payload.length === 1) {
      payload = payload[0];
    }
    return translatePayload(payload, text);
  };

  const translateEvent = (event: string): string => {
    const data = extractSseData(event);
    if (data === null) {
      const stray = event.split("\n").some((line) => line.trim() && !isSseFieldLine(line));
      return stray ? translateBareBody(event.trim()) : "";
    }
    if (data === "[DONE]") {
      return "";
    }
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      return emitError(malformedUpstreamResponse("$", "event is not valid JSON"), data);
    }
    return translatePayload(payload, data);
  };

  const drain = (final: boolean): string => {
    let output = "";
    let separatorIndex = buffer.indexOf("\n\n");
    while (!ended && separatorIndex !== -1) {
      const event = buffer.slice(0, separatorIndex);
      buffer = buffer.slice(separatorIndex + 2);
      output += translateEvent(event);
      separatorIndex = buffer.indexOf("\n\n");
    }
    if (final && !ended && buffer.trim().length > 0) {
      output += translateEvent(buffer);
      buffer = "";
    }
    return output;
  };

  return {
    push: (text) => {
      if (ended) {
        return "";
      }
      buffer += text.replace(/\r/g, "");
      return drain(false);
    },
    finish: () => {
      if (ended) {
        return "";
      }
      let output = drain(true);
      if (!ended && !translatedAny) {
        output += emitError(
          malformedUpstreamResponse("$", "stream ended without a data event"),
          ""
        );
      }
      ended = true;
      return output;
    },
    get ended() {
      return ended;
    },
  };
}

export type TranslateSseStreamOptions = {
  logger?: Logger;
  /** Maps a failed upstream read (deadline, reset) to the error event sent downstream. */
  mapReadError?: (error: unknown) => RelayError;
  /** Runs once when the stream completes, fails or is cancelled. */
  onClose?: () => void;
};

/**
 * Pull-driven: each downstream pull reads one upstream chunk, so a slow
 * client slows the upstream read. Cancelling downstream cancels upstream.
 */
export function translateSseStream(
  body: ReadableStream<Uint8Array>,
  options: TranslateSseStreamOptions = {}
): ReadableStream<Uint8Array> {
  const logger = options.logger ?? NOOP_LOGGER;
  const reader = body.getReader();
  const translator = createStreamTranslator({ logger });
  const decoder = new TextDecoder();
  const encoder = new TextEncoder();
  let settled = false;
  let cancelled = false;

  const settle = () => {
    if (settled) {
      return;
    }
    settled = true;
    options.onClose?.();
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      // A pull must enqueue or close before returning, or the stream stalls.
      for (;;) {
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
          chunk = await reader.read();
        } catch (error) {
          if (cancelled) {
            return;
          }
          const relayError =
            options.mapReadError?.(error) ??
            upstreamError({
              statusCode: 502,
              message: `Upstream stream failed: ${describeError(error)}`,
            });
          logger.warn("stream_read_failed", { code: relayError.code, message: describeError(error) });
          controller.enqueue(encoder.encode(encodeSseError(relayError)));
          controller.close();
          settle();
          return;
        }

        if (cancelled) {
          return;
        }
        if (chunk.done) {
          const tail = translator.push(decoder.decode()) + translator.finish();
          if (tail) {
            controller.enqueue(encoder.encode(tail));
          }
          controller.close();
          settle();
          return;
        }

        const output = translator.push(decoder.decode(chunk.value, { stream: true }));
        if (output) {
          controller.enqueue(encoder.encode(output));
        }
        if (translator.ended) {
          controller.close();
          settle();
          await reader.cancel();
          return;
        }
        if (output) {
          return;
        }
      }
    },
    async cancel(reason) {
      cancelled = true;
      logger.info("stream_cancelled", { reason: describeError(reason) });
      settle();
      await reader.cancel(reason);
    },
  });
}

function extractSseData(event: string): string | null {
  const dataLines = event
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).trimStart());
  if (dataLines.length === 0) {
    return null;
  }
  return dataLines.join("\n");
}

function isSseFieldLine(line: string): boolean {
  return line.startsWith(":") || /^(data|event|id|retry)(:|$)/.test(line);
}
