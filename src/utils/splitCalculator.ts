import type {
  AssignmentStore,
  LineItem,
  Participant,
  ParticipantId,
  SplitItemShare,
  SplitResult,
  StableItemKey,
} from '../types/domain'
import { assignedParticipantIds } from './assignments'
import {
  addFractions,
  divideCents,
  fractionToAmount,
  fromCents,
  toCents,
  ZERO_CENTS,
  type FractionalCents,
} from './money'
import { normalizeParticipantId } from './participants'

export interface SplitInput {
  items: LineItem[]
  resolveKey: (item: LineItem) => StableItemKey
  participants: readonly Participant[]
  assignments: AssignmentStore
}

export interface AllocationSummary {
  totalAssigned: number
  receiptItemsTotal: number
  unassignedItemKeys: StableItemKey[]
  fullyAssigned: boolean
}

type ParticipantAccumulator = {
  owed: FractionalCents
  items: SplitItemShare[]
}

// The line total is rounded, never the unit price.
export const itemPriceCents = (item: LineItem) => toCents(item.unitPrice * item.quantity)

/**
 * Each item is divided equally among whoever shares it. Shares stay exact
 * until the per-participant total, which is rounded once to the cent.
 */
export function calculateSplits({ items, resolveKey, participants, assignments }: SplitInput): SplitResult[] {
  const accumulators = new Map<ParticipantId, ParticipantAccumulator>()
  participants.forEach((participant) => {
    accumulators.set(normalizeParticipantId(participant.id), { owed: ZERO_CENTS, items: [] })
  })

  items.forEach((item) => {
    const assignees = new Set(assignedParticipantIds(assignments, resolveKey(item)).map(normalizeParticipantId))
    if (assignees.size === 0) {
      return
    }

    const priceCents = itemPriceCents(item)
    const share = divideCents(priceCents, assignees.size)
    const shareEntry: SplitItemShare = {
      name: item.name,
      price: fromCents(priceCents),
      shareAmount: fractionToAmount(share),
    }

    assignees.forEach((participantId) => {
      const accumulator = accumulators.get(participantId)
      if (!accumulator) {
        return
      }
      accumulator.owed = addFractions(accumulator.owed, share)
      accumulator.items.push(shareEntry)
    })
  })

  return participants.map((participant) => {
    const accumulator = accumulators.get(normalizeParticipantId(participant.id))
    const shares = accumulator?.items ?? []
    return {
      participantId: participant.id,
      name: participant.name,
      colorToken: participant.colorToken,
      totalOwed: fractionToAmount(accumulator?.owed ?? ZERO_CENTS),
      itemCount: shares.length,
      items: shares,
    }
  })
}

export function summarizeAllocation(input: SplitInput): AllocationSummary {
  const splits = calculateSplits(input)
  let receiptCents = 0
  const unassignedItemKeys: StableItemKey[] = []

  input.items.forEach((item) => {
    receiptCents += itemPriceCents(item)
    const key = input.resolveKey(item)
    if (assignedParticipantIds(input.assignments, key).length === 0) {
      unassignedItemKeys.push(key)
    }
  })

  const assignedCents = splits.reduce((sum, split) => sum + toCents(split.totalOwed), 0)

  return {
    totalAssigned: fromCents(assignedCents),
    receiptItemsTotal: fromCents(receiptCents),
    unassignedItemKeys,
    fullyAssigned: unassignedItemKeys.length === 0,
  }
}

