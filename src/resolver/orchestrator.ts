/**
 * Resolution Orchestrator
 *
 * Single entry point: picks the remote resolver when one is available and
 * falls back to the rule-based resolver for that call when it fails.
 *
 * Modes:
 * - remote:  one remote attempt per call, rules on any failure
 * - offline: rules only (demo flag, no credential, or failed start-up probe)
 *
 * There is no retry loop and no sticky failure state: a failed call does not
 * change how the next call is handled.
 */

import { config } from "../config/index.js";
import { createOpenAIRemoteResolver } from "../adapters/llm/openai.js";
import type { RemoteResolver } from "../adapters/llm/openai.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { resolveWithContext } from "./rule-resolver.js";
import type {
  FallbackReason,
  RemoteOutcome,
  ResolutionResult,
  ResolutionSource,
  ResolutionTrace,
  ResolveOptions,
  Transcript,
} from "./types.js";

export type OrchestratorMode = "remote" | "offline";

export class ResolutionOrchestrator {
  constructor(private readonly remote: RemoteResolver | null) {}

  get mode(): OrchestratorMode {
    return this.remote ? "remote" : "offline";
  }

  /** Model name when running remote, null offline. */
  get model(): string | null {
    return this.remote?.model ?? null;
  }

  /**
   * Probe the remote resolver once. Returns this instance when the probe
   * succeeds (or there is nothing to probe), an offline one otherwise.
   */
  async probed(): Promise<ResolutionOrchestrator> {
    if (!this.remote) return this;
    return (await this.remote.probe()) ? this : new ResolutionOrchestrator(null);
  }

  async resolve(
    utterance: string,
    dataContext: string,
    transcript: Transcript,
    opts: ResolveOptions = {},
  ): Promise<ResolutionResult> {
    const trace = await this.resolveWithTrace(utterance, dataContext, transcript, opts);
    return trace.result;
  }

  /**
   * Resolve and report which path answered and why the rules were used.
   */
  async resolveWithTrace(
    utterance: string,
    dataContext: string,
    transcript: Transcript,
    opts: ResolveOptions = {},
  ): Promise<ResolutionTrace> {
    const startTime = Date.now();

    let source: ResolutionSource = "rules";
    let fallbackReason: FallbackReason | null = "remote_unavailable";
    let result: ResolutionResult | null = null;

    if (this.remote) {
      const outcome = await this.attemptRemote(this.remote, utterance, dataContext, transcript, opts);
      if (outcome.ok) {
        source = "remote";
        fallbackReason = null;
        result = outcome.result;
      } else {
        fallbackReason = outcome.failure.reason;
        log.warn(
          { request_id: opts.requestId, reason: outcome.failure.reason, message: outcome.failure.message },
          "Remote resolution failed; falling back to rules for this call",
        );
        emit(TelemetryEvents.RemoteFallback, {
          request_id: opts.requestId,
          fallback_reason: outcome.failure.reason,
          remote_elapsed_ms: outcome.failure.elapsed_ms,
        });
      }
    }

    if (result === null) {
      result = resolveWithContext(utterance, transcript);
    }

    const elapsedMs = Date.now() - startTime;
    emit(TelemetryEvents.ResolutionCompleted, {
      request_id: opts.requestId,
      source,
      fallback_reason: fallbackReason,
      result_type: result.type,
      function_name: result.type === "function_call" ? result.name : null,
      elapsed_ms: elapsedMs,
    });

    return { result, source, fallback_reason: fallbackReason, elapsed_ms: elapsedMs };
  }

  /**
   * The adapter reports failures as values; anything it still throws is
   * treated as a transport failure so the caller always gets a result.
   */
  private async attemptRemote(
    remote: RemoteResolver,
    utterance: string,
    dataContext: string,
    transcript: Transcript,
    opts: ResolveOptions,
  ): Promise<RemoteOutcome> {
    const startTime = Date.now();
    try {
      return await remote.resolve({ utterance, dataContext, transcript }, opts);
    } catch (error) {
      return {
        ok: false,
        failure: {
          kind: "remote_call_failed",
          reason: "transport",
          message: error instanceof Error ? error.message : String(error),
          elapsed_ms: Date.now() - startTime,
        },
      };
    }
  }
}

/**
 * Build the orchestrator from configuration.
 * Offline when DEMO_MODE is set or no credential is configured.
 */
export function createOrchestrator(): ResolutionOrchestrator {
  if (config.remote.demoMode) {
    log.info("Demo mode enabled; using rule-based resolution");
    return new ResolutionOrchestrator(null);
  }

  const remote = createOpenAIRemoteResolver();
  if (!remote) {
    log.info("No OPENAI_API_KEY configured; using rule-based resolution");
  }
  return new ResolutionOrchestrator(remote);
}

/**
 * As createOrchestrator, plus a start-up credential probe unless
 * REMOTE_PROBE_ON_STARTUP=false. A failed probe pins the instance offline.
 */
export async function createOrchestratorWithProbe(): Promise<ResolutionOrchestrator> {
  const orchestrator = createOrchestrator();
  return config.remote.probeOnStartup ? orchestrator.probed() : orchestrator;
}
