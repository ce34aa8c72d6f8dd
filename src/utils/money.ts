const CENT_FACTOR = 100

/** Exact amount of cents, kept as a reduced fraction so division never drifts. */
export interface FractionalCents {
  numerator: number
  denominator: number
}

export const ZERO_CENTS: FractionalCents = { numerator: 0, denominator: 1 }

/** Rounds half away from zero, like `roundFractionToCents`. */
export const toCents = (value: number) => Math.sign(value) * Math.round(Math.abs(value) * CENT_FACTOR)
export const fromCents = (value: number) => Number((value / CENT_FACTOR).toFixed(2))

function greatestCommonDivisor(a: number, b: number): number {
  let x = Math.abs(a)
  let y = Math.abs(b)
  while (y !== 0) {
    const next = x % y
    x = y
    y = next
  }
  return x || 1
}

function reduce(numerator: number, denominator: number): FractionalCents {
  const divisor = greatestCommonDivisor(numerator, denominator)
  const sign = denominator < 0 ? -1 : 1
  return {
    numerator: (sign * numerator) / divisor,
    denominator: (sign * denominator) / divisor,
  }
}

export function divideCents(cents: number, parts: number): FractionalCents {
  if (!Number.isInteger(parts) || parts <= 0) {
    throw new RangeError(`Cannot divide an amount into ${parts} parts.`)
  }
  return reduce(cents, parts)
}

export function addFractions(left: FractionalCents, right: FractionalCents): FractionalCents {
  if (left.denominator === right.denominator) {
    return reduce(left.numerator + right.numerator, left.denominator)
  }
  return reduce(
    left.numerator * right.denominator + right.numerator * left.denominator,
    left.denominator * right.denominator,
  )
}

/** Rounds half away from zero to a whole cent. */
export function roundFractionToCents(value: FractionalCents): number {
  const magnitude = Math.abs(value.numerator)
  const rounded = Math.floor((2 * magnitude + value.denominator) / (2 * value.denominator))
  return value.numerator < 0 ? -rounded : rounded
}

export const fractionToAmount = (value: FractionalCents) => fromCents(roundFractionToCents(value))

export function formatAmount(value: number, currency: string): string {
  return `${value.toFixed(2)} ${currency}`
}
