import type Lot from './@types/Lot.js'
import type LotMatch from './@types/LotMatch.js'
import type Ticker from './@types/Ticker.js'
import { InsufficientLotError } from './errors.js'
import byDate from './util/byDate.js'
import sum from './util/sum.js'

/** Quantities closer than this are considered equal. */
export const epsilon = 1e-9

/**
 * Covers a sell from open lots, oldest first (FIFO). Lots acquired on the same date are used in input order.
 * Throws InsufficientLotError if the lots do not cover the sell. Does not modify the lots.
 */
const matchLots = (lots: readonly Lot[], sell: { cur: Ticker; amount: number; line?: number }): LotMatch[] => {
  const open = lots.filter(lot => lot.cur === sell.cur && lot.amount > epsilon)
  const available = open.map(lot => lot.amount).reduce(sum, 0)
  if (available < sell.amount - epsilon) {
    throw new InsufficientLotError(sell.cur, sell.amount, available, sell.line)
  }

  const matches: LotMatch[] = []
  let remaining = sell.amount
  for (const lot of [...open].sort(byDate)) {
    if (remaining <= epsilon) break
    const amount = Math.min(lot.amount, remaining)
    matches.push({ lot, amount })
    remaining -= amount
  }

  return matches
}

export default matchLots
