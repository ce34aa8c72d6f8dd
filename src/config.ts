export interface SplitEngineConfig {
  /** Base URL of the split API, without a trailing slash. */
  apiBase: string
  requestTimeoutMs: number
  /** Upper bound on cache warming fetches in flight at once. */
  maxConcurrentFetches: number
  /** Throw on invariant violations instead of logging and ignoring them. */
  strictInvariants: boolean
  currency: string
}

export const DEFAULT_SPLIT_CONFIG: SplitEngineConfig = {
  apiBase: '',
  requestTimeoutMs: 30_000,
  maxConcurrentFetches: 5,
  strictInvariants: true,
  currency: 'EUR',
}

type Env = Record<string, string | undefined>

function readPositiveInteger(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function trimTrailingSlash(value: string) {
  return value.replace(/\/+$/, '')
}

export function resolveSplitConfig(overrides: Partial<SplitEngineConfig> = {}): SplitEngineConfig {
  const merged = { ...DEFAULT_SPLIT_CONFIG, ...overrides }
  return {
    ...merged,
    apiBase: trimTrailingSlash(merged.apiBase),
    maxConcurrentFetches: Math.max(1, Math.floor(merged.maxConcurrentFetches)),
  }
}

export function readSplitConfigFromEnv(env: Env = process.env): SplitEngineConfig {
  return resolveSplitConfig({
    apiBase: env.SPLIT_API_BASE?.trim() ?? DEFAULT_SPLIT_CONFIG.apiBase,
    requestTimeoutMs: readPositiveInteger(env.SPLIT_REQUEST_TIMEOUT_MS, DEFAULT_SPLIT_CONFIG.requestTimeoutMs),
    maxConcurrentFetches: readPositiveInteger(
      env.SPLIT_MAX_CONCURRENT_FETCHES,
      DEFAULT_SPLIT_CONFIG.maxConcurrentFetches,
    ),
    strictInvariants: env.NODE_ENV !== 'production',
    currency: env.SPLIT_CURRENCY?.trim() || DEFAULT_SPLIT_CONFIG.currency,
  })
}
