import OpenAI from "openai";
import { config } from "../../config/index.js";
import { remoteResolveTimeoutMs } from "../../config/timeouts.js";
import type { RemoteOutcome, ResolutionResult, ResolveOptions, Transcript } from "../../resolver/types.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { RemoteResponseError, toRemoteFailure, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";
import { assembleMessages, assembleTools } from "./prompt.js";
import { parseRemoteMessage } from "./response-parser.js";

// ============================================================================
// Types
// ============================================================================

export interface RemoteResolveRequest {
  utterance: string;
  /** Short description of the loaded data (counts, date range); prompt only. */
  dataContext: string;
  transcript: Transcript;
}

/**
 * A resolver backed by a remote language model. Never throws from resolve():
 * every failure comes back as a tagged outcome.
 */
export interface RemoteResolver {
  readonly model: string;
  resolve(request: RemoteResolveRequest, opts?: ResolveOptions): Promise<RemoteOutcome>;
  /** Cheap credential check; false when the service cannot be reached. */
  probe(): Promise<boolean>;
}

export interface OpenAIResolverOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  windowTurns: number;
  compactThreshold: number;
}

const PROVIDER = "openai";
const PROBE_MAX_TOKENS = 5;

// ============================================================================
// Adapter
// ============================================================================

export class OpenAIRemoteResolver implements RemoteResolver {
  // Lazy so constructing the adapter never touches the network stack
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIResolverOptions) {}

  get model(): string {
    return this.options.model;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseUrl,
        // One attempt per call; the orchestrator falls back instead of retrying
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async resolve(request: RemoteResolveRequest, opts: ResolveOptions = {}): Promise<RemoteOutcome> {
    const startTime = Date.now();
    try {
      const result = await this.callRemote(request, opts, startTime);
      const elapsedMs = Date.now() - startTime;
      emit(TelemetryEvents.RemoteSucceeded, {
        request_id: opts.requestId,
        model: this.options.model,
        result_type: result.type,
        function_name: result.type === "function_call" ? result.name : null,
        elapsed_ms: elapsedMs,
      });
      return { ok: true, result, elapsed_ms: elapsedMs };
    } catch (error) {
      const failure = toRemoteFailure(error, Date.now() - startTime);
      emit(TelemetryEvents.RemoteFailed, {
        request_id: opts.requestId,
        model: this.options.model,
        reason: failure.reason,
        message: failure.message,
        elapsed_ms: failure.elapsed_ms,
      });
      return { ok: false, failure };
    }
  }

  private async callRemote(
    request: RemoteResolveRequest,
    opts: ResolveOptions,
    startTime: number,
  ): Promise<ResolutionResult> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.options.timeoutMs);
    let cancelledByCaller = false;
    const onCallerAbort = () => {
      cancelledByCaller = true;
      abortController.abort();
    };
    if (opts.signal?.aborted) {
      onCallerAbort();
    } else {
      opts.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      const messages = assembleMessages(request.utterance, request.dataContext, request.transcript, {
        windowTurns: this.options.windowTurns,
        compactThreshold: this.options.compactThreshold,
      });

      const response = await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          messages,
          tools: assembleTools(),
          tool_choice: "auto",
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        },
        { signal: abortController.signal },
      );

      const message = response.choices[0]?.message;
      if (!message) {
        throw new RemoteResponseError("Remote response contained no choices", "empty_response");
      }

      log.debug(
        {
          request_id: opts.requestId,
          tool_calls: message.tool_calls?.length ?? 0,
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
        "Remote resolver responded",
      );

      return parseRemoteMessage(message, request.utterance);
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (error instanceof RemoteResponseError) {
        log.warn({ request_id: opts.requestId, reason: error.reason, elapsed_ms: elapsedMs }, error.message);
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === "AbortError" || abortController.signal.aborted) {
          log.warn(
            { request_id: opts.requestId, timeout_ms: this.options.timeoutMs, elapsed_ms: elapsedMs, cancelled_by_caller: cancelledByCaller },
            cancelledByCaller ? "Remote resolution cancelled by caller" : "Remote resolution timed out",
          );
          throw new UpstreamTimeoutError(
            cancelledByCaller ? "Remote resolution was cancelled" : "Remote resolution timed out",
            PROVIDER,
            "resolve",
            cancelledByCaller,
            elapsedMs,
            error,
          );
        }

        // The SDK throws errors with status and headers properties for non-2xx responses
        if ("status" in error && typeof error.status === "number") {
          const requestId = "request_id" in error && typeof error.request_id === "string" ? error.request_id : undefined;
          const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
          log.error(
            { request_id: opts.requestId, upstream_request_id: requestId, status: error.status, elapsed_ms: elapsedMs },
            "Remote resolver returned non-2xx status",
          );
          throw new UpstreamHTTPError(
            `Remote resolution failed: ${error.message || "unknown error"}`,
            PROVIDER,
            error.status,
            code,
            requestId,
            elapsedMs,
            error,
          );
        }
      }

      log.error({ request_id: opts.requestId, error, elapsed_ms: elapsedMs }, "Remote resolution failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  async probe(): Promise<boolean> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.options.timeoutMs);
    try {
      await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          messages: [{ role: "user", content: "Hello" }],
          max_tokens: PROBE_MAX_TOKENS,
        },
        { signal: abortController.signal },
      );
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ model: this.options.model, error: message }, "Remote resolver probe failed; using rule-based resolution");
      emit(TelemetryEvents.RemoteProbeFailed, { model: this.options.model, message });
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Build the adapter from configuration.
 * Returns null when no credential is configured.
 */
export function createOpenAIRemoteResolver(): OpenAIRemoteResolver | null {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) return null;

  return new OpenAIRemoteResolver({
    apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    timeoutMs: remoteResolveTimeoutMs(),
    windowTurns: config.transcript.windowTurns,
    compactThreshold: config.transcript.compactThreshold,
  });
}
