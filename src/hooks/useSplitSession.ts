import { useCallback, useMemo, useSyncExternalStore } from 'react'
import { isBusyStatus, type SplitSession } from '../state/splitSession'
import type { ParticipantId, RecentFriend, StableItemKey } from '../types/domain'
import { isFullyAssigned } from '../utils/assignments'
import { calculateSplits } from '../utils/splitCalculator'

export function useSplitSession(session: SplitSession) {
  const snapshot = useSyncExternalStore(session.subscribe, session.getSnapshot, session.getSnapshot)

  const splits = useMemo(
    () =>
      calculateSplits({
        items: [...session.items],
        resolveKey: session.keyFor,
        participants: snapshot.participants,
        assignments: snapshot.assignments,
      }),
    [session, snapshot.participants, snapshot.assignments],
  )

  const fullyAssigned = useMemo(
    () => isFullyAssigned(snapshot.assignments, [...session.itemKeys]),
    [session, snapshot.assignments],
  )

  const toggleAssignment = useCallback(
    (itemKey: StableItemKey, participantId: ParticipantId) => session.toggleAssignment(itemKey, participantId),
    [session],
  )
  const addParticipant = useCallback((name: string) => session.addParticipant(name), [session])
  const addParticipantFromRecent = useCallback(
    (friend: RecentFriend) => session.addParticipantFromRecent(friend),
    [session],
  )
  const removeParticipant = useCallback((participantId: ParticipantId) => session.removeParticipant(participantId), [session])
  const assignAllToEveryone = useCallback(() => session.assignAllToEveryone(), [session])
  const save = useCallback(() => session.save(), [session])

  return {
    ...snapshot,
    isBusy: isBusyStatus(snapshot.status),
    isFullyAssigned: fullyAssigned,
    splits,
    toggleAssignment,
    addParticipant,
    addParticipantFromRecent,
    removeParticipant,
    assignAllToEveryone,
    save,
  }
}
