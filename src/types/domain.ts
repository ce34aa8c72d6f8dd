export type ParticipantId = string
export type StableItemKey = string
export type ReceiptId = string

export interface LineItem {
  sourceIndex: number
  backendItemId: string | null
  name: string
  unitPrice: number
  quantity: number
}

export interface ReceiptSource {
  receiptId: ReceiptId
  storeName: string | null
  totalAmount: number | null
  lineItems(): LineItem[]
}

export interface Participant {
  id: ParticipantId
  name: string
  colorToken: string
  displayOrder: number
  isSelf: boolean
}

/** Item key to the ids of everyone sharing that item. Ids are stored lower-cased. */
export type AssignmentStore = Readonly<Record<StableItemKey, readonly ParticipantId[]>>

export interface SplitItemShare {
  name: string
  price: number
  shareAmount: number
}

export interface SplitResult {
  participantId: ParticipantId
  name: string
  colorToken: string
  totalOwed: number
  itemCount: number
  items: SplitItemShare[]
}

export interface ParticipantDraft {
  name: string
  colorToken: string
  isSelf: boolean
}

export interface AssignmentDraft {
  itemKey: StableItemKey
  participantIndices: number[]
}

export interface SplitRequest {
  receiptId: ReceiptId
  participants: ParticipantDraft[]
  assignments: AssignmentDraft[]
}

export interface SplitRecord {
  id: string | null
  receiptId: ReceiptId
  participants: Participant[]
  assignments: Record<StableItemKey, ParticipantId[]>
  createdAt?: string
  updatedAt?: string
}

export interface RecentFriend {
  id: string
  name: string
  colorToken: string
  lastUsedAt: string | null
  useCount: number
}

export interface SplitBackend {
  /** Resolves to `null` when the receipt has never been split. */
  fetchExisting(receiptId: ReceiptId): Promise<SplitRecord | null>
  save(request: SplitRequest): Promise<SplitRecord>
  fetchRecentFriends?(limit?: number): Promise<RecentFriend[]>
}
