import { env } from "node:process";

const MIN_TIMEOUT_MS = 1_000; // 1s
const MAX_TIMEOUT_MS = 60_000; // 60s

export const DEFAULT_REMOTE_RESOLVE_TIMEOUT_MS = 10_000;

export function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/**
 * Wall-clock budget for one remote resolution (and the start-up probe).
 * Read on each call so tests can stub the environment.
 */
export function remoteResolveTimeoutMs(): number {
  return clampTimeout(parseTimeoutEnv("REMOTE_RESOLVE_TIMEOUT_MS", DEFAULT_REMOTE_RESOLVE_TIMEOUT_MS));
}
