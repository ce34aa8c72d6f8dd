import { describe, expect, test } from 'vitest'
import type { Participant, SplitRecord } from '../../types/domain'
import { SplitError } from '../splitErrors'
import {
  applySplitRecord,
  buildSplitRequest,
  encodeSplitRequest,
  parseRecentFriends,
  parseSplitRecord,
} from '../splitPayload'

const captureError = (run: () => unknown): unknown => {
  try {
    run()
  } catch (error) {
    return error
  }
  return undefined
}

const participants: Participant[] = [
  { id: 'SELF-ID', name: 'Me', colorToken: '#3B82F6', displayOrder: 0, isSelf: true },
  { id: 'bob-id', name: 'Bob', colorToken: '#4ECDC4', displayOrder: 1, isSelf: false },
  { id: 'cara-id', name: 'Cara', colorToken: '#FFE66D', displayOrder: 2, isSelf: false },
]

describe('buildSplitRequest', () => {
  test('replaces participant ids with their position', () => {
    const request = buildSplitRequest('rcpt-1', participants, {
      'itm-bread': ['self-id'],
      'local-item-1': ['cara-id', 'self-id'],
      'local-item-2': [],
      'local-item-3': ['ghost-id'],
    })

    expect(request).toEqual({
      receiptId: 'rcpt-1',
      participants: [
        { name: 'Me', colorToken: '#3B82F6', isSelf: true },
        { name: 'Bob', colorToken: '#4ECDC4', isSelf: false },
        { name: 'Cara', colorToken: '#FFE66D', isSelf: false },
      ],
      assignments: [
        { itemKey: 'itm-bread', participantIndices: [0] },
        { itemKey: 'local-item-1', participantIndices: [0, 2] },
      ],
    })
  })

  test('encodes the wire body with string indices', () => {
    const request = buildSplitRequest('rcpt-1', participants.slice(0, 2), { 'itm-bread': ['self-id', 'bob-id'] })

    expect(encodeSplitRequest(request)).toEqual({
      receipt_id: 'rcpt-1',
      participants: [
        { name: 'Me', color: '#3B82F6', is_me: true },
        { name: 'Bob', color: '#4ECDC4', is_me: false },
      ],
      assignments: [{ transaction_id: 'itm-bread', participant_ids: ['0', '1'] }],
    })
  })
})

describe('parseSplitRecord', () => {
  test('orders participants and lower-cases assignment ids', () => {
    const record = parseSplitRecord({
      id: 'split-9',
      receipt_id: 'rcpt-1',
      participants: [
        { id: 'B0B-UUID', name: 'Bob', color: '#4ECDC4', display_order: 1, is_me: false },
        { id: 'SELF-UUID', name: 'Me', color: '#3B82F6', display_order: 0, is_me: true },
      ],
      assignments: [
        { id: 'a-1', transaction_id: 'itm-bread', participant_ids: ['SELF-UUID'] },
        { id: 'a-2', transaction_id: 'local-item-1', participant_ids: ['self-uuid', 'B0B-UUID'] },
      ],
      created_at: '2026-02-02T10:00:00Z',
    })

    expect(record).toEqual({
      id: 'split-9',
      receiptId: 'rcpt-1',
      participants: [
        { id: 'SELF-UUID', name: 'Me', colorToken: '#3B82F6', displayOrder: 0, isSelf: true },
        { id: 'B0B-UUID', name: 'Bob', colorToken: '#4ECDC4', displayOrder: 1, isSelf: false },
      ],
      assignments: {
        'itm-bread': ['self-uuid'],
        'local-item-1': ['self-uuid', 'b0b-uuid'],
      },
      createdAt: '2026-02-02T10:00:00Z',
    })
  })

  test('recognises the owner by name when the flag is missing', () => {
    const record = parseSplitRecord({
      receipt_id: 'rcpt-1',
      participants: [
        { id: 'x-1', name: 'Bob', display_order: 0 },
        { id: 'y-2', name: 'me', display_order: 1 },
      ],
    })

    expect(record.id).toBeNull()
    expect(record.participants.map((participant) => [participant.id, participant.displayOrder, participant.isSelf])).toEqual([
      ['y-2', 0, true],
      ['x-1', 1, false],
    ])
    expect(record.assignments).toEqual({})
  })

  test('falls back to the first participant as the owner', () => {
    const record = parseSplitRecord({
      receipt_id: 'rcpt-1',
      participants: [
        { id: 'x-1', name: 'Bob', display_order: 3 },
        { id: 'z-3', name: 'Zoe', display_order: 1 },
      ],
    })
    expect(record.participants.map((participant) => participant.name)).toEqual(['Zoe', 'Bob'])
    expect(record.participants[0].isSelf).toBe(true)
  })

  test('orders participants without a usable position by where they appear', () => {
    const record = parseSplitRecord({
      receipt_id: 'rcpt-1',
      participants: [
        { id: 'self-id', name: 'Me', is_me: true, display_order: 0 },
        { id: 'cara-id', name: 'Cara', display_order: 5 },
        { id: 'bob-id', name: 'Bob', display_order: Number.NaN },
      ],
    })

    expect(record.participants.map((participant) => [participant.name, participant.displayOrder])).toEqual([
      ['Me', 0],
      ['Bob', 1],
      ['Cara', 2],
    ])
  })

  test('rejects malformed payloads', () => {
    expect(() => parseSplitRecord(null)).toThrow(SplitError)
    expect(() => parseSplitRecord({ receipt_id: 'rcpt-1', participants: [] })).toThrow(
      'Failed to decode response: split has no participants',
    )
    expect(captureError(() => parseSplitRecord({ receipt_id: 'rcpt-1', participants: [{ name: 'No id' }] }))).toMatchObject({
      kind: 'server-rejected',
      reason: 'Failed to decode response: participant 0 is missing an id or name',
    })
  })
})

describe('applySplitRecord', () => {
  test('puts the self participant first with contiguous order', () => {
    const record: SplitRecord = {
      id: 'split-1',
      receiptId: 'rcpt-1',
      participants: [
        { id: 'bob-id', name: 'Bob', colorToken: '#4ECDC4', displayOrder: 0, isSelf: false },
        { id: 'self-id', name: 'Me', colorToken: '#3B82F6', displayOrder: 4, isSelf: true },
      ],
      assignments: { 'itm-bread': ['BOB-ID', 'bob-id'] },
    }

    const local = applySplitRecord(record)
    expect(local.participants.map((participant) => [participant.id, participant.displayOrder])).toEqual([
      ['self-id', 0],
      ['bob-id', 1],
    ])
    expect(local.assignments).toEqual({ 'itm-bread': ['bob-id'] })
  })

  test('makes the first participant the owner when none is marked', () => {
    const record: SplitRecord = {
      id: 'split-1',
      receiptId: 'rcpt-1',
      participants: [
        { id: 'dana-id', name: 'Dana', colorToken: '#FF6B6B', displayOrder: 1, isSelf: false },
        { id: 'bob-id', name: 'Bob', colorToken: '#4ECDC4', displayOrder: 0, isSelf: false },
      ],
      assignments: {},
    }

    const local = applySplitRecord(record)
    expect(local.participants.map((participant) => [participant.id, participant.isSelf])).toEqual([
      ['bob-id', true],
      ['dana-id', false],
    ])
  })

  test('keeps a single owner when several are marked', () => {
    const record: SplitRecord = {
      id: 'split-1',
      receiptId: 'rcpt-1',
      participants: [
        { id: 'bob-id', name: 'Bob', colorToken: '#4ECDC4', displayOrder: 1, isSelf: true },
        { id: 'self-id', name: 'Me', colorToken: '#3B82F6', displayOrder: 0, isSelf: true },
      ],
      assignments: {},
    }

    const local = applySplitRecord(record)
    expect(local.participants.map((participant) => [participant.id, participant.isSelf])).toEqual([
      ['self-id', true],
      ['bob-id', false],
    ])
  })
})

describe('parseRecentFriends', () => {
  test('keeps only usable entries', () => {
    const friends = parseRecentFriends([
      { id: 'f-1', name: 'Dana', color: '#00CED1', last_used_at: '2026-03-01T08:00:00Z', use_count: 4 },
      { id: 'f-2', name: '  ' },
      'not-a-friend',
      { id: 'f-3', name: 'Eli' },
    ])

    expect(friends).toEqual([
      { id: 'f-1', name: 'Dana', colorToken: '#00CED1', lastUsedAt: '2026-03-01T08:00:00Z', useCount: 4 },
      { id: 'f-3', name: 'Eli', colorToken: '#95E879', lastUsedAt: null, useCount: 0 },
    ])
  })
})
