import type { ReceiptSource, SplitRecord, SplitRequest } from '../../types/domain'

export const groceryReceipt = (receiptId = 'rcpt-1'): ReceiptSource => ({
  receiptId,
  storeName: 'Corner Shop',
  totalAmount: 5,
  // Every call decodes fresh objects, as a refetch would.
  lineItems: () => [
    { sourceIndex: 0, backendItemId: null, name: 'Bread', unitPrice: 2, quantity: 1 },
    { sourceIndex: 1, backendItemId: null, name: 'Milk', unitPrice: 3, quantity: 1 },
  ],
})

/** What the server sends back: its own upper-case ids in place of positions. */
export const storedSplitFor = (request: SplitRequest): SplitRecord => ({
  id: 'split-1',
  receiptId: request.receiptId,
  participants: request.participants.map((participant, index) => ({
    id: `SRV-${index}`,
    name: participant.name,
    colorToken: participant.colorToken,
    displayOrder: index,
    isSelf: participant.isSelf,
  })),
  assignments: Object.fromEntries(
    request.assignments.map((assignment) => [
      assignment.itemKey,
      assignment.participantIndices.map((index) => `SRV-${index}`),
    ]),
  ),
})
