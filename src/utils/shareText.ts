import type { SplitResult } from '../types/domain'
import { formatAmount } from './money'

export interface ShareTextOptions {
  storeName: string | null
  totalAmount: number | null
  currency: string
}

export function generateShareText(results: SplitResult[], { storeName, totalAmount, currency }: ShareTextOptions): string {
  const lines: string[] = [`Split for ${storeName?.trim() || 'Receipt'}`]
  if (totalAmount !== null) {
    lines.push(`Total: ${formatAmount(totalAmount, currency)}`)
  }
  lines.push('')

  results
    .slice()
    .sort((a, b) => b.totalOwed - a.totalOwed)
    .forEach((result) => {
      lines.push(`${result.name}: ${formatAmount(result.totalOwed, currency)}`)
    })

  return lines.join('\n')
}
