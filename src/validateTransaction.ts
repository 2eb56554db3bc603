import type Amount from './@types/Amount.js'
import type { Transaction } from './@types/Entry.js'
import type Posting from './@types/Posting.js'
import { ImbalanceError } from './errors.js'

export const defaultTolerance = 0.005

export interface ValidationResult {
  ok: boolean
  /** Net amount per currency. */
  residual: { [currency: string]: number }
  errors: ImbalanceError[]
}

/** Returns the amount a posting contributes to the balance of its transaction: at cost, else at price, else in units. */
export const weight = (posting: Posting): Amount => {
  const { units, cost, price } = posting
  if (cost?.number != null && cost.currency) {
    return { number: units.number * cost.number, currency: cost.currency }
  } else if (price) {
    return { number: units.number * price.number, currency: price.currency }
  }
  return units
}

/** Checks that the postings of a transaction sum to zero in every currency, within the tolerance. */
const validateTransaction = (
  tx: Pick<Transaction, 'postings' | 'line'>,
  options: { tolerance?: number } = {},
): ValidationResult => {
  const tolerance = options.tolerance ?? defaultTolerance
  const residual: ValidationResult['residual'] = {}

  for (const posting of tx.postings) {
    const { number, currency } = weight(posting)
    residual[currency] = (residual[currency] ?? 0) + number
  }

  const errors = Object.entries(residual)
    .filter(([, delta]) => Math.abs(delta) > tolerance)
    .map(([currency, delta]) => new ImbalanceError(currency, delta, tx.line))

  return { ok: errors.length === 0, residual, errors }
}

export default validateTransaction
