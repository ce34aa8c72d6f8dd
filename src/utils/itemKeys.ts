import type { LineItem, StableItemKey } from '../types/domain'

const LOCAL_ITEM_PREFIX = 'local-item-'
const UNRESOLVED_ITEM_PREFIX = 'unresolved-item-'

export interface ItemKeyResolver {
  keyAt(sourceIndex: number): StableItemKey | undefined
  keyFor(item: LineItem): StableItemKey
  /** Every key, in receipt order. */
  keys(): StableItemKey[]
}

function backendIdOf(item: LineItem): string | null {
  const id = item.backendItemId?.trim()
  return id ? id : null
}

export function deriveItemKey(item: LineItem): StableItemKey {
  return backendIdOf(item) ?? `${LOCAL_ITEM_PREFIX}${item.sourceIndex}`
}

export function buildItemKeys(items: LineItem[]): Map<number, StableItemKey> {
  const keys = new Map<number, StableItemKey>()
  items.forEach((item) => {
    keys.set(item.sourceIndex, deriveItemKey(item))
  })
  return keys
}

/**
 * Builds the key map once for a loaded receipt. Later decodes of the same
 * receipt resolve through this map by position, never by object identity.
 */
export function createItemKeyResolver(items: LineItem[]): ItemKeyResolver {
  const keysByIndex = buildItemKeys(items)
  const orderedKeys = items.map((item) => keysByIndex.get(item.sourceIndex) ?? deriveItemKey(item))
  let unresolvedCount = 0

  const keyFor = (item: LineItem): StableItemKey => {
    const cached = keysByIndex.get(item.sourceIndex)
    const backendId = backendIdOf(item)
    if (cached !== undefined && (backendId === null || backendId === cached)) {
      return cached
    }

    // The item does not belong to the receipt this resolver was built for.
    if (backendId !== null) {
      console.warn(`Line item ${item.sourceIndex} not found on receipt, using its backend id.`)
      return backendId
    }
    unresolvedCount += 1
    console.warn(`Line item ${item.sourceIndex} not found on receipt, using a placeholder key.`)
    return `${UNRESOLVED_ITEM_PREFIX}${unresolvedCount}`
  }

  return {
    keyAt: (sourceIndex) => keysByIndex.get(sourceIndex),
    keyFor,
    keys: () => [...orderedKeys],
  }
}
