import { applySplitRecord, buildSplitRequest } from '../api/splitPayload'
import { failure, SplitError, success, toSplitError, type Result } from '../api/splitErrors'
import { resolveSplitConfig, type SplitEngineConfig } from '../config'
import type {
  AssignmentStore,
  LineItem,
  Participant,
  ParticipantId,
  RecentFriend,
  ReceiptSource,
  SplitBackend,
  SplitRecord,
  SplitResult,
  StableItemKey,
} from '../types/domain'
import {
  assignAll,
  createDefaultAssignments,
  isFullyAssigned,
  purgeParticipant,
  toggleAssignment,
} from '../utils/assignments'
import { createItemKeyResolver } from '../utils/itemKeys'
import {
  addParticipant,
  addParticipantFromRecent,
  createSelfParticipant,
  findParticipant,
  removeParticipant,
} from '../utils/participants'
import { generateShareText } from '../utils/shareText'
import { calculateSplits, summarizeAllocation, type AllocationSummary } from '../utils/splitCalculator'
import type { SplitCache } from './splitCache'
import type { SplitEventBus } from './splitEvents'

export type SplitSessionStatus =
  | 'unsynced'
  | 'loading'
  | 'no-existing-split'
  | 'loaded'
  | 'saving'
  | 'saved'
  | 'save-failed'

export interface SplitSessionSnapshot {
  status: SplitSessionStatus
  participants: readonly Participant[]
  assignments: AssignmentStore
  savedSplitId: string | null
  error: SplitError | null
  recentFriends: readonly RecentFriend[]
}

type Action =
  | { type: 'toggle'; itemKey: StableItemKey; participantId: ParticipantId }
  | { type: 'add-participant'; participants: Participant[] }
  | { type: 'remove-participant'; participantId: ParticipantId }
  | { type: 'assign-all'; itemKeys: StableItemKey[] }
  | { type: 'load-started' }
  | { type: 'load-succeeded'; record: SplitRecord | null }
  | { type: 'load-failed'; error: SplitError; previousStatus: SplitSessionStatus }
  | { type: 'save-started' }
  | { type: 'save-succeeded'; record: SplitRecord }
  | { type: 'save-failed'; error: SplitError }
  | { type: 'record-received'; record: SplitRecord }
  | { type: 'set-recent-friends'; friends: RecentFriend[] }

const BUSY_STATUSES: ReadonlySet<SplitSessionStatus> = new Set(['loading', 'saving'])

export const isBusyStatus = (status: SplitSessionStatus) => BUSY_STATUSES.has(status)

function withRecord(state: SplitSessionSnapshot, record: SplitRecord, status: SplitSessionStatus): SplitSessionSnapshot {
  const { participants, assignments } = applySplitRecord(record)
  return {
    ...state,
    status,
    participants,
    assignments,
    savedSplitId: record.id,
    error: null,
  }
}

export function splitSessionReducer(state: SplitSessionSnapshot, action: Action): SplitSessionSnapshot {
  switch (action.type) {
    case 'toggle':
      return {
        ...state,
        assignments: toggleAssignment(state.assignments, action.itemKey, action.participantId),
      }
    case 'add-participant':
      return { ...state, participants: action.participants }
    case 'remove-participant': {
      const participants = removeParticipant(state.participants, action.participantId)
      if (participants.length === state.participants.length) {
        return state
      }
      return {
        ...state,
        participants,
        assignments: purgeParticipant(state.assignments, action.participantId),
      }
    }
    case 'assign-all':
      return {
        ...state,
        assignments: assignAll(
          action.itemKeys,
          state.participants.map((participant) => participant.id),
        ),
      }
    case 'load-started':
      return { ...state, status: 'loading', error: null }
    case 'load-succeeded':
      if (!action.record) {
        return { ...state, status: 'no-existing-split', error: null }
      }
      return withRecord(state, action.record, 'loaded')
    case 'load-failed':
      return { ...state, status: action.previousStatus, error: action.error }
    case 'save-started':
      return { ...state, status: 'saving', error: null }
    case 'save-succeeded':
      return withRecord(state, action.record, 'saved')
    case 'save-failed':
      return { ...state, status: 'save-failed', error: action.error }
    case 'record-received':
      return withRecord(state, action.record, 'loaded')
    case 'set-recent-friends':
      return { ...state, recentFriends: action.friends }
    default:
      return state
  }
}

export interface SplitSessionDependencies {
  backend: SplitBackend
  cache?: SplitCache
  events?: SplitEventBus
  config?: Partial<SplitEngineConfig>
}

export interface SplitSession {
  readonly id: string
  readonly receipt: ReceiptSource
  readonly items: readonly LineItem[]
  readonly itemKeys: readonly StableItemKey[]
  readonly participants: readonly Participant[]
  readonly assignments: AssignmentStore
  readonly status: SplitSessionStatus
  readonly isBusy: boolean
  readonly isFullyAssigned: boolean
  keyFor(item: LineItem): StableItemKey
  keyAt(sourceIndex: number): StableItemKey | undefined
  toggleAssignment(itemKey: StableItemKey, participantId: ParticipantId): void
  addParticipant(name: string): Participant
  addParticipantFromRecent(friend: RecentFriend): Participant
  removeParticipant(participantId: ParticipantId): boolean
  assignAllToEveryone(): void
  computeSplits(): SplitResult[]
  summary(): AllocationSummary
  shareText(): string
  load(): Promise<Result<SplitRecord | null>>
  save(): Promise<Result<SplitRecord>>
  loadRecentFriends(limit?: number): Promise<RecentFriend[]>
  subscribe(listener: () => void): () => void
  getSnapshot(): SplitSessionSnapshot
  dispose(): void
}

/**
 * Sets up a receipt for splitting: stable keys for its items, the self
 * participant, and every item on self. Nothing is fetched until `load`.
 */
export function createSplitSession(receipt: ReceiptSource, dependencies: SplitSessionDependencies): SplitSession {
  const { backend, cache, events } = dependencies
  const config = resolveSplitConfig(dependencies.config)
  const sessionId = crypto.randomUUID()

  const items = receipt.lineItems()
  const resolver = createItemKeyResolver(items)
  const itemKeys = resolver.keys()
  const knownItemKeys = new Set(itemKeys)
  const self = createSelfParticipant()

  let state: SplitSessionSnapshot = {
    status: 'unsynced',
    participants: [self],
    assignments: createDefaultAssignments(itemKeys, self.id),
    savedSplitId: null,
    error: null,
    recentFriends: [],
  }
  let disposed = false
  const listeners = new Set<() => void>()

  const dispatch = (action: Action) => {
    // Late completions on a torn-down session have nobody to tell.
    if (disposed) {
      return
    }
    const next = splitSessionReducer(state, action)
    if (next === state) {
      return
    }
    state = next
    Array.from(listeners).forEach((listener) => listener())
  }

  const violation = (reason: string) => {
    const error = new SplitError('invariant-violation', reason)
    if (config.strictInvariants) {
      throw error
    }
    console.warn(error.message)
  }

  const unsubscribeEvents = events?.subscribe((event) => {
    if (event.type !== 'split-saved') {
      return
    }
    if (event.origin === sessionId || event.receiptId !== receipt.receiptId || isBusyStatus(state.status)) {
      return
    }
    // Unsaved edits from a failed save wait for a retry.
    if (state.status === 'save-failed') {
      return
    }
    dispatch({ type: 'record-received', record: event.record })
  })

  const splitInput = () => ({
    items,
    resolveKey: resolver.keyFor,
    participants: state.participants,
    assignments: state.assignments,
  })

  async function load(): Promise<Result<SplitRecord | null>> {
    if (isBusyStatus(state.status)) {
      return failure(new SplitError('invariant-violation', 'Another load or save is still running'))
    }
    const previousStatus = state.status
    dispatch({ type: 'load-started' })

    try {
      const record = await backend.fetchExisting(receipt.receiptId)
      if (record) {
        cache?.put(receipt.receiptId, record)
      }
      dispatch({ type: 'load-succeeded', record })
      return success(record)
    } catch (error) {
      const splitError = toSplitError(error)
      if (splitError.kind === 'not-found') {
        dispatch({ type: 'load-succeeded', record: null })
        return success(null)
      }
      dispatch({ type: 'load-failed', error: splitError, previousStatus })
      return failure(splitError)
    }
  }

  async function save(): Promise<Result<SplitRecord>> {
    if (isBusyStatus(state.status)) {
      return failure(new SplitError('invariant-violation', 'Another load or save is still running'))
    }
    if (state.status === 'unsynced') {
      return failure(new SplitError('invariant-violation', 'The existing split has not been loaded yet'))
    }

    const request = buildSplitRequest(receipt.receiptId, state.participants, state.assignments)
    dispatch({ type: 'save-started' })

    let record: SplitRecord
    try {
      record = await backend.save(request)
    } catch (error) {
      const splitError = toSplitError(error)
      dispatch({ type: 'save-failed', error: splitError })
      return failure(splitError)
    }

    dispatch({ type: 'save-succeeded', record })
    cache?.put(receipt.receiptId, record)
    events?.publish({ type: 'split-saved', receiptId: receipt.receiptId, record, origin: sessionId })
    events?.publish({ type: 'receipts-changed' })
    return success(record)
  }

  async function loadRecentFriends(limit = 10): Promise<RecentFriend[]> {
    if (!backend.fetchRecentFriends) {
      return []
    }
    try {
      const friends = await backend.fetchRecentFriends(limit)
      dispatch({ type: 'set-recent-friends', friends })
      return friends
    } catch (error) {
      console.error('Failed to load recent friends', error)
      return []
    }
  }

  return {
    id: sessionId,
    receipt,
    items,
    itemKeys,
    get participants() {
      return state.participants
    },
    get assignments() {
      return state.assignments
    },
    get status() {
      return state.status
    },
    get isBusy() {
      return isBusyStatus(state.status)
    },
    get isFullyAssigned() {
      return isFullyAssigned(state.assignments, itemKeys)
    },
    keyFor: resolver.keyFor,
    keyAt: resolver.keyAt,
    toggleAssignment(itemKey, participantId) {
      if (!knownItemKeys.has(itemKey)) {
        violation(`Unknown item key ${itemKey}`)
        return
      }
      if (!findParticipant(state.participants, participantId)) {
        violation(`Unknown participant ${participantId}`)
        return
      }
      dispatch({ type: 'toggle', itemKey, participantId })
    },
    addParticipant(name) {
      const result = addParticipant(state.participants, name)
      dispatch({ type: 'add-participant', participants: result.participants })
      return result.participant
    },
    addParticipantFromRecent(friend) {
      const result = addParticipantFromRecent(state.participants, friend)
      dispatch({ type: 'add-participant', participants: result.participants })
      return result.participant
    },
    removeParticipant(participantId) {
      const before = state.participants
      dispatch({ type: 'remove-participant', participantId })
      return state.participants !== before
    },
    assignAllToEveryone() {
      dispatch({ type: 'assign-all', itemKeys })
    },
    computeSplits: () => calculateSplits(splitInput()),
    summary: () => summarizeAllocation(splitInput()),
    shareText: () =>
      generateShareText(calculateSplits(splitInput()), {
        storeName: receipt.storeName,
        totalAmount: receipt.totalAmount,
        currency: config.currency,
      }),
    load,
    save,
    loadRecentFriends,
    subscribe(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    getSnapshot: () => state,
    dispose() {
      disposed = true
      listeners.clear()
      unsubscribeEvents?.()
    },
  }
}

/** Creates the session and tries to pick up a split saved earlier for the receipt. */
export async function beginSession(
  receipt: ReceiptSource,
  dependencies: SplitSessionDependencies,
): Promise<SplitSession> {
  const session = createSplitSession(receipt, dependencies)
  await session.load()
  return session
}
