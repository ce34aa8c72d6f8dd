import { createHttpSplitBackend, type FetchLike } from './api/httpSplitBackend'
import { resolveSplitConfig, type SplitEngineConfig } from './config'
import { createSplitCache, type SplitCache } from './state/splitCache'
import { createSplitEventBus, type SplitEventBus } from './state/splitEvents'
import { beginSession, type SplitSession } from './state/splitSession'
import type { ReceiptSource, SplitBackend } from './types/domain'

export interface SplitEngineOptions {
  config?: Partial<SplitEngineConfig>
  getAuthToken: () => Promise<string>
  fetchImpl?: FetchLike
}

export interface SplitEngine {
  config: SplitEngineConfig
  backend: SplitBackend
  cache: SplitCache
  events: SplitEventBus
  beginSession(receipt: ReceiptSource): Promise<SplitSession>
}

/** One per app: every session shares the backend, cache and event bus. */
export function createSplitEngine({ config: overrides, getAuthToken, fetchImpl }: SplitEngineOptions): SplitEngine {
  const config = resolveSplitConfig(overrides)
  const backend = createHttpSplitBackend({
    apiBase: config.apiBase,
    getAuthToken,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl,
  })
  const cache = createSplitCache({ backend, maxConcurrentFetches: config.maxConcurrentFetches })
  const events = createSplitEventBus()

  return {
    config,
    backend,
    cache,
    events,
    beginSession: (receipt) => beginSession(receipt, { backend, cache, events, config }),
  }
}
