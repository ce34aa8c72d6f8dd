import type { AssignmentStore, ParticipantId, StableItemKey } from '../types/domain'
import { normalizeParticipantId } from './participants'

function uniqueIds(ids: Iterable<ParticipantId>): ParticipantId[] {
  return Array.from(new Set(Array.from(ids, normalizeParticipantId)))
}

export function createDefaultAssignments(itemKeys: StableItemKey[], selfId: ParticipantId): AssignmentStore {
  const selfKey = normalizeParticipantId(selfId)
  return Object.fromEntries(itemKeys.map((key) => [key, [selfKey]]))
}

export function assignedParticipantIds(store: AssignmentStore, itemKey: StableItemKey): readonly ParticipantId[] {
  return store[itemKey] ?? []
}

export function isAssignedTo(store: AssignmentStore, itemKey: StableItemKey, participantId: ParticipantId): boolean {
  const normalized = normalizeParticipantId(participantId)
  return assignedParticipantIds(store, itemKey).some((id) => normalizeParticipantId(id) === normalized)
}

/** Adds the participant to the item when absent, removes it otherwise. */
export function toggleAssignment(
  store: AssignmentStore,
  itemKey: StableItemKey,
  participantId: ParticipantId,
): AssignmentStore {
  const normalized = normalizeParticipantId(participantId)
  const current = assignedParticipantIds(store, itemKey)
  const next = isAssignedTo(store, itemKey, normalized)
    ? current.filter((id) => normalizeParticipantId(id) !== normalized)
    : [...current, normalized]
  return { ...store, [itemKey]: next }
}

export function assignAll(itemKeys: StableItemKey[], participantIds: Iterable<ParticipantId>): AssignmentStore {
  const everyone = uniqueIds(participantIds)
  return Object.fromEntries(itemKeys.map((key) => [key, [...everyone]]))
}

export function purgeParticipant(store: AssignmentStore, participantId: ParticipantId): AssignmentStore {
  const normalized = normalizeParticipantId(participantId)
  return Object.fromEntries(
    Object.entries(store).map(([key, ids]) => [key, ids.filter((id) => normalizeParticipantId(id) !== normalized)]),
  )
}

export function normalizeAssignments(assignments: Record<StableItemKey, readonly ParticipantId[]>): AssignmentStore {
  return Object.fromEntries(
    Object.entries(assignments).map(([key, ids]) => [key, uniqueIds(ids)]),
  )
}

export function unassignedItemKeys(store: AssignmentStore, itemKeys: StableItemKey[]): StableItemKey[] {
  return itemKeys.filter((key) => assignedParticipantIds(store, key).length === 0)
}

export function isFullyAssigned(store: AssignmentStore, itemKeys: StableItemKey[]): boolean {
  return unassignedItemKeys(store, itemKeys).length === 0
}
