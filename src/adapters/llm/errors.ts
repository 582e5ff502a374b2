/**
 * Error types for remote resolution failures
 *
 * The adapter classifies SDK errors into these typed errors internally and
 * converts them into a tagged RemoteFailure at its boundary; nothing here is
 * thrown past the adapter.
 */

import type { RemoteFailure, RemoteFailureReason } from "../../resolver/types.js";

/**
 * Upstream timeout - the wall-clock budget ran out, or the caller cancelled.
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly cancelledByCaller: boolean,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - the API answered with a non-2xx status.
 *
 * Keeps the provider request id for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

/**
 * The model answered, but not with something the resolver can use: an
 * unknown function, unparseable arguments, or an empty message.
 */
export class RemoteResponseError extends Error {
  readonly name = "RemoteResponseError";

  constructor(
    message: string,
    public readonly reason: Extract<RemoteFailureReason, "malformed_arguments" | "unknown_function" | "empty_response">,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RemoteResponseError);
    }
  }
}

/**
 * Map any error raised on the remote path to a tagged failure.
 * Unrecognised errors count as transport failures.
 */
export function toRemoteFailure(error: unknown, elapsedMs: number): RemoteFailure {
  let reason: RemoteFailureReason = "transport";
  if (error instanceof UpstreamTimeoutError) {
    reason = error.cancelledByCaller ? "aborted" : "timeout";
  } else if (error instanceof UpstreamHTTPError) {
    reason = "upstream_http";
  } else if (error instanceof RemoteResponseError) {
    reason = error.reason;
  }

  return {
    kind: "remote_call_failed",
    reason,
    message: error instanceof Error ? error.message : String(error),
    elapsed_ms: elapsedMs,
  };
}
