import type {
  AssignmentDraft,
  AssignmentStore,
  Participant,
  ParticipantId,
  RecentFriend,
  ReceiptId,
  SplitRecord,
  SplitRequest,
  StableItemKey,
} from '../types/domain'
import { normalizeAssignments } from '../utils/assignments'
import { normalizeParticipantId, paletteColor, renumberParticipants, SELF_NAME } from '../utils/participants'
import { SplitError } from './splitErrors'

type RawParticipant = {
  id?: unknown
  name?: unknown
  color?: unknown
  display_order?: unknown
  is_me?: unknown
}

type RawAssignment = {
  transaction_id?: unknown
  participant_ids?: unknown
}

type RawSplit = {
  id?: unknown
  receipt_id?: unknown
  participants?: unknown
  assignments?: unknown
  created_at?: unknown
  updated_at?: unknown
}

type RawRecentFriend = {
  id?: unknown
  name?: unknown
  color?: unknown
  last_used_at?: unknown
  use_count?: unknown
}

export interface SplitRequestBody {
  receipt_id: ReceiptId
  participants: Array<{ name: string; color: string; is_me: boolean }>
  assignments: Array<{ transaction_id: StableItemKey; participant_ids: string[] }>
}

export interface LocalSplitState {
  participants: Participant[]
  assignments: AssignmentStore
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined)

function decodeError(reason: string): SplitError {
  return new SplitError('server-rejected', `Failed to decode response: ${reason}`)
}

/**
 * Swaps participant ids for their position in the list: the server does not
 * know client-generated ids and hands out its own when the split is stored.
 * Items nobody shares are left out.
 */
export function buildSplitRequest(
  receiptId: ReceiptId,
  participants: readonly Participant[],
  assignments: AssignmentStore,
): SplitRequest {
  const indexById = new Map<ParticipantId, number>(
    participants.map((participant, index) => [normalizeParticipantId(participant.id), index]),
  )

  const assignmentDrafts = Object.entries(assignments).reduce<AssignmentDraft[]>((accumulator, [itemKey, ids]) => {
    const indices = new Set<number>()
    ids.forEach((id) => {
      const index = indexById.get(normalizeParticipantId(id))
      if (index !== undefined) {
        indices.add(index)
      }
    })
    if (indices.size > 0) {
      accumulator.push({ itemKey, participantIndices: Array.from(indices).sort((a, b) => a - b) })
    }
    return accumulator
  }, [])

  return {
    receiptId,
    participants: participants.map((participant) => ({
      name: participant.name,
      colorToken: participant.colorToken,
      isSelf: participant.isSelf,
    })),
    assignments: assignmentDrafts,
  }
}

export function encodeSplitRequest(request: SplitRequest): SplitRequestBody {
  return {
    receipt_id: request.receiptId,
    participants: request.participants.map((participant) => ({
      name: participant.name,
      color: participant.colorToken,
      is_me: participant.isSelf,
    })),
    assignments: request.assignments.map((assignment) => ({
      transaction_id: assignment.itemKey,
      participant_ids: assignment.participantIndices.map((index) => String(index)),
    })),
  }
}

/** Older splits only mark the owner by name; failing that, the first entry is the owner. */
function chooseSelf<T extends { name: string }>(ordered: T[], isFlagged: (entry: T) => boolean): T {
  return (
    ordered.find(isFlagged) ??
    ordered.find((entry) => entry.name.toLowerCase() === SELF_NAME.toLowerCase()) ??
    ordered[0]
  )
}

function parseParticipants(value: unknown): Participant[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw decodeError('split has no participants')
  }

  const decoded = value.map((entry: unknown, index) => {
    const raw: RawParticipant = isRecord(entry) ? entry : {}
    const id = asString(raw.id)?.trim()
    const name = asString(raw.name)?.trim()
    if (!id || !name) {
      throw decodeError(`participant ${index} is missing an id or name`)
    }
    const order = raw.display_order
    return {
      id,
      name,
      colorToken: asString(raw.color) ?? paletteColor(index),
      displayOrder: typeof order === 'number' && Number.isFinite(order) ? order : index,
      flaggedSelf: raw.is_me === true,
    }
  })

  const ordered = decoded.slice().sort((a, b) => a.displayOrder - b.displayOrder)
  const self = chooseSelf(ordered, (entry) => entry.flaggedSelf)

  const participants = [self, ...ordered.filter((entry) => entry !== self)].map((entry) => ({
    id: entry.id,
    name: entry.name,
    colorToken: entry.colorToken,
    displayOrder: entry.displayOrder,
    isSelf: entry === self,
  }))
  return renumberParticipants(participants)
}

function parseAssignments(value: unknown): Record<StableItemKey, ParticipantId[]> {
  if (value === undefined || value === null) {
    return {}
  }
  if (!Array.isArray(value)) {
    throw decodeError('assignments must be a list')
  }

  const merged: Record<StableItemKey, ParticipantId[]> = {}
  value.forEach((entry: unknown, index) => {
    const raw: RawAssignment = isRecord(entry) ? entry : {}
    const itemKey = asString(raw.transaction_id)
    if (!itemKey || !Array.isArray(raw.participant_ids)) {
      throw decodeError(`assignment ${index} is malformed`)
    }
    const ids = raw.participant_ids.filter((id: unknown): id is string => typeof id === 'string')
    merged[itemKey] = [...(merged[itemKey] ?? []), ...ids]
  })

  const normalized = normalizeAssignments(merged)
  return Object.fromEntries(Object.entries(normalized).map(([key, ids]) => [key, [...ids]]))
}

export function parseSplitRecord(payload: unknown): SplitRecord {
  if (!isRecord(payload)) {
    throw decodeError('expected a split object')
  }
  const raw: RawSplit = payload
  const receiptId = asString(raw.receipt_id)
  if (!receiptId) {
    throw decodeError('receipt_id is missing')
  }

  return {
    id: asString(raw.id) ?? null,
    receiptId,
    participants: parseParticipants(raw.participants),
    assignments: parseAssignments(raw.assignments),
    createdAt: asString(raw.created_at),
    updatedAt: asString(raw.updated_at),
  }
}

export function parseRecentFriends(payload: unknown): RecentFriend[] {
  if (!Array.isArray(payload)) {
    throw decodeError('expected a list of recent friends')
  }

  return payload.reduce<RecentFriend[]>((accumulator, entry: unknown, index) => {
    if (!isRecord(entry)) {
      return accumulator
    }
    const raw: RawRecentFriend = entry
    const id = asString(raw.id)
    const name = asString(raw.name)?.trim()
    if (!id || !name) {
      return accumulator
    }
    accumulator.push({
      id,
      name,
      colorToken: asString(raw.color) ?? paletteColor(index),
      lastUsedAt: asString(raw.last_used_at) ?? null,
      useCount: typeof raw.use_count === 'number' ? raw.use_count : 0,
    })
    return accumulator
  }, [])
}

/** The server's record replaces local state wholesale once a split is stored. */
export function applySplitRecord(record: SplitRecord): LocalSplitState {
  const ordered = record.participants.slice().sort((a, b) => a.displayOrder - b.displayOrder)
  if (ordered.length === 0) {
    return { participants: [], assignments: normalizeAssignments(record.assignments) }
  }
  const self = chooseSelf(ordered, (participant) => participant.isSelf)
  const participants = [self, ...ordered.filter((participant) => participant !== self)].map((participant) =>
    participant.isSelf === (participant === self) ? participant : { ...participant, isSelf: participant === self },
  )
  return {
    participants: renumberParticipants(participants),
    assignments: normalizeAssignments(record.assignments),
  }
}
