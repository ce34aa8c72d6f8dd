import type { ParticipantId, ReceiptId, SplitBackend, SplitRecord, StableItemKey } from '../types/domain'
import { createLimiter } from '../utils/limit'
import { getInitials, normalizeParticipantId } from '../utils/participants'

export const DEFAULT_MAX_CONCURRENT_FETCHES = 5

export interface SplitParticipantInfo {
  id: ParticipantId
  name: string
  colorToken: string
  initials: string
  isSelf: boolean
}

export interface CachedSplit {
  splitId: string | null
  receiptId: ReceiptId
  participants: SplitParticipantInfo[]
  /** Keyed by lower-cased item key. */
  assignments: Record<string, ParticipantId[]>
}

export interface SplitCache {
  get(receiptId: ReceiptId): CachedSplit | undefined
  has(receiptId: ReceiptId): boolean
  put(receiptId: ReceiptId, record: SplitRecord): void
  remove(receiptId: ReceiptId): void
  clear(): void
  participantsForItem(receiptId: ReceiptId, itemKey: StableItemKey): SplitParticipantInfo[]
  isItemSplit(receiptId: ReceiptId, itemKey: StableItemKey): boolean
  isLoading(receiptId: ReceiptId): boolean
  /** Fetches and caches one receipt's split unless it is cached or already on its way. */
  fetch(receiptId: ReceiptId): Promise<void>
  warm(receiptIds: ReceiptId[]): Promise<void>
}

export interface SplitCacheOptions {
  backend: Pick<SplitBackend, 'fetchExisting'>
  maxConcurrentFetches?: number
}

function toCachedSplit(record: SplitRecord): CachedSplit {
  const participants = record.participants.map((participant) => ({
    id: participant.id,
    name: participant.name,
    colorToken: participant.colorToken,
    initials: getInitials(participant.name),
    isSelf: participant.isSelf,
  }))

  const assignments: Record<string, ParticipantId[]> = {}
  Object.entries(record.assignments).forEach(([itemKey, ids]) => {
    assignments[itemKey.toLowerCase()] = ids.map(normalizeParticipantId)
  })

  return { splitId: record.id, receiptId: record.receiptId, participants, assignments }
}

export function createSplitCache({
  backend,
  maxConcurrentFetches = DEFAULT_MAX_CONCURRENT_FETCHES,
}: SplitCacheOptions): SplitCache {
  const entries = new Map<ReceiptId, CachedSplit>()
  const inFlight = new Map<ReceiptId, Promise<void>>()
  const limit = createLimiter(maxConcurrentFetches)

  const put = (receiptId: ReceiptId, record: SplitRecord) => {
    entries.set(receiptId, toCachedSplit(record))
  }

  const participantsForItem = (receiptId: ReceiptId, itemKey: StableItemKey) => {
    const cached = entries.get(receiptId)
    const ids = cached?.assignments[itemKey.toLowerCase()]
    if (!cached || !ids) {
      return []
    }
    return ids.reduce<SplitParticipantInfo[]>((accumulator, id) => {
      const participant = cached.participants.find((entry) => normalizeParticipantId(entry.id) === id)
      if (participant) {
        accumulator.push(participant)
      }
      return accumulator
    }, [])
  }

  const fetch = (receiptId: ReceiptId): Promise<void> => {
    if (entries.has(receiptId)) {
      return Promise.resolve()
    }
    const pending = inFlight.get(receiptId)
    if (pending) {
      return pending
    }

    const task = limit(async () => {
      if (entries.has(receiptId)) {
        return
      }
      try {
        const record = await backend.fetchExisting(receiptId)
        if (record) {
          put(receiptId, record)
        }
      } catch (error) {
        // Only decorates item rows; a missing entry is retried on the next fetch.
        console.error(`Failed to fetch split for receipt ${receiptId}`, error)
      }
    }).finally(() => {
      inFlight.delete(receiptId)
    })
    inFlight.set(receiptId, task)
    return task
  }

  return {
    get: (receiptId) => entries.get(receiptId),
    has: (receiptId) => entries.has(receiptId),
    put,
    remove: (receiptId) => {
      entries.delete(receiptId)
    },
    clear: () => {
      entries.clear()
    },
    participantsForItem,
    isItemSplit: (receiptId, itemKey) =>
      (entries.get(receiptId)?.assignments[itemKey.toLowerCase()]?.length ?? 0) > 0,
    isLoading: (receiptId) => inFlight.has(receiptId),
    fetch,
    warm: async (receiptIds) => {
      await Promise.all(Array.from(new Set(receiptIds), (receiptId) => fetch(receiptId)))
    },
  }
}
