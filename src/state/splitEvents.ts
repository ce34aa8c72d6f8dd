import type { ReceiptId, SplitRecord } from '../types/domain'

export type SplitEvent =
  | {
      type: 'split-saved'
      receiptId: ReceiptId
      record: SplitRecord
      /** Identifies the publisher so it can ignore its own events. */
      origin: string
    }
  | { type: 'receipts-changed' }

export type SplitEventListener = (event: SplitEvent) => void

export interface SplitEventBus {
  publish(event: SplitEvent): void
  subscribe(listener: SplitEventListener): () => void
}

export function createSplitEventBus(): SplitEventBus {
  const listeners = new Set<SplitEventListener>()

  return {
    publish(event) {
      Array.from(listeners).forEach((listener) => {
        try {
          listener(event)
        } catch (error) {
          console.error(`Split event listener failed on ${event.type}`, error)
        }
      })
    },
    subscribe(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
