// Error classification for OpenAI-compatible endpoints.
//
// Two sources, never mixed:
//   HTTP failures: the server answered; classify by status and the JSON error envelope.
//   Network failures: no response at all; classify by error name and errno code.

import { z } from "zod";
import type { GatewayErrorCode } from "@toolplan/core";
import { WireErrorBodySchema } from "./wire";

const CONTEXT_LENGTH_MARKERS = new Set(["context_length_exceeded", "exceed_context_size_error"]);

const NETWORK_ERRNO = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN", "UND_ERR_SOCKET"]);

function parseErrorBody(body: string): z.output<typeof WireErrorBodySchema>["error"] | undefined {
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    // plain-text error pages carry no envelope
    return undefined;
  }
  const parsed = WireErrorBodySchema.safeParse(value);
  return parsed.success ? parsed.data.error : undefined;
}

/**
 * Classify a non-2xx response. Only the status and the envelope's `code` and
 * `type` fields are consulted; the free-text message is not.
 */
export function classifyHttpFailure(status: number, body: string): GatewayErrorCode {
  const error = parseErrorBody(body);
  if (
    status === 413 ||
    (typeof error?.code === "string" && CONTEXT_LENGTH_MARKERS.has(error.code)) ||
    (typeof error?.type === "string" && CONTEXT_LENGTH_MARKERS.has(error.type))
  ) {
    return "context_length_exceeded";
  }

  switch (status) {
    case 401:
    case 403:
      return "auth_failed";
    case 429:
      return "throttled";
    case 400:
    case 404:
    case 422:
      return "invalid_request";
    default:
      return "unknown";
  }
}

const ErrnoCauseSchema = z.object({ code: z.string() });

/** Classify a fetch that produced no response. */
export function classifyNetworkError(err: unknown): GatewayErrorCode {
  if (!(err instanceof Error)) return "unknown";

  // an AbortError is the caller's doing, not the network's
  if (err.name === "AbortError") return "cancelled";
  if (err.name === "TimeoutError") return "transient_network";

  const cause = ErrnoCauseSchema.safeParse(err.cause);
  if (cause.success && NETWORK_ERRNO.has(cause.data.code)) return "transient_network";

  const msg = err.message.toLowerCase();
  if (msg.includes("fetch failed") || [...NETWORK_ERRNO].some((code) => msg.includes(code.toLowerCase()))) {
    return "transient_network";
  }
  return "unknown";
}

/**
 * Suffix for error messages when the endpoint could not be reached at all,
 * so a self-hosted server that is down reads as such.
 */
export function buildErrorHint(code: GatewayErrorCode, transportName: string, baseUrl: string): string {
  if (code === "transient_network") {
    return ` (is ${transportName} reachable at ${baseUrl}?)`;
  }
  return "";
}
