import { SplitError } from '../api/splitErrors'
import type { Participant, ParticipantId, RecentFriend } from '../types/domain'

export const SELF_NAME = 'Me'
export const SELF_COLOR = '#3B82F6'

export const FRIEND_PALETTE = [
  '#FF6B6B',
  '#4ECDC4',
  '#FFE66D',
  '#95E879',
  '#B388EB',
  '#FF9F45',
  '#FF69B4',
  '#00CED1',
] as const

export function paletteColor(index: number): string {
  const position = ((index % FRIEND_PALETTE.length) + FRIEND_PALETTE.length) % FRIEND_PALETTE.length
  return FRIEND_PALETTE[position]
}

/**
 * Participant ids coming back from the server may differ in letter case
 * from the ones generated here, so every comparison goes through this.
 */
export function normalizeParticipantId(id: ParticipantId): ParticipantId {
  return id.trim().toLowerCase()
}

export function sameParticipantId(left: ParticipantId, right: ParticipantId): boolean {
  return normalizeParticipantId(left) === normalizeParticipantId(right)
}

export function generateParticipantId(): ParticipantId {
  return crypto.randomUUID().toLowerCase()
}

export function createSelfParticipant(): Participant {
  return {
    id: generateParticipantId(),
    name: SELF_NAME,
    colorToken: SELF_COLOR,
    displayOrder: 0,
    isSelf: true,
  }
}

export function findParticipant(participants: readonly Participant[], id: ParticipantId): Participant | undefined {
  return participants.find((participant) => sameParticipantId(participant.id, id))
}

export function getSelfParticipant(participants: readonly Participant[]): Participant | undefined {
  return participants.find((participant) => participant.isSelf)
}

/**
 * Appends a participant at the end of the list. The newcomer is not put on
 * any item: existing shares only change when someone is explicitly added.
 */
export function addParticipant(
  participants: readonly Participant[],
  name: string,
  colorToken?: string,
): { participants: Participant[]; participant: Participant } {
  const trimmed = name.trim()
  if (!trimmed) {
    throw new SplitError('invariant-violation', 'Participant name is required')
  }

  const participant: Participant = {
    id: generateParticipantId(),
    name: trimmed,
    colorToken: colorToken ?? paletteColor(participants.length),
    displayOrder: participants.length,
    isSelf: false,
  }
  return { participants: [...participants, participant], participant }
}

export function addParticipantFromRecent(participants: readonly Participant[], friend: RecentFriend) {
  return addParticipant(participants, friend.name, friend.colorToken)
}

export function renumberParticipants(participants: readonly Participant[]): Participant[] {
  return participants.map((participant, index) =>
    participant.displayOrder === index ? participant : { ...participant, displayOrder: index },
  )
}

/** Removing the self participant leaves the list untouched. */
export function removeParticipant(participants: readonly Participant[], id: ParticipantId): Participant[] {
  const target = findParticipant(participants, id)
  if (!target || target.isSelf) {
    return [...participants]
  }
  return renumberParticipants(participants.filter((participant) => participant !== target))
}

export function getInitials(name: string): string {
  const parts = name.trim().split(/\s+/).filter(Boolean)
  if (parts.length >= 2) {
    return `${parts[0].charAt(0)}${parts[1].charAt(0)}`.toUpperCase()
  }
  return name.trim().slice(0, 2).toUpperCase()
}
