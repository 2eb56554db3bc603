import type AdjustedLot from './@types/AdjustedLot.js'
import type Lot from './@types/Lot.js'
import { epsilon } from './matchLots.js'
import byDate from './util/byDate.js'
import { fromCents, toCents } from './util/cents.js'
import sum from './util/sum.js'

/**
 * Splits replacement lots into the shares that replace sold shares and the rest, in purchase order.
 * index is the position of the lot in replacementLots. Without soldAmount every share is a replacement share.
 */
export const replacementShares = (
  replacementLots: readonly Lot[],
  soldAmount = Infinity,
): { lot: Lot; index: number; replacement: boolean }[] => {
  const shares: { lot: Lot; index: number; replacement: boolean }[] = []
  const ordered = replacementLots.map((lot, index) => ({ lot, index })).sort((a, b) => byDate(a.lot, b.lot))
  let remaining = soldAmount
  for (const { lot, index } of ordered) {
    const amount = Math.min(lot.amount, remaining)
    if (amount > epsilon) {
      shares.push({ lot: { ...lot, amount }, index, replacement: true })
      remaining -= amount
    }
    if (lot.amount - amount > epsilon) {
      shares.push({ lot: { ...lot, amount: lot.amount - amount }, index, replacement: false })
    }
  }
  return shares
}

/**
 * Adds a disallowed loss to the basis of the replacement lots, in proportion to each lot's share of the replacement
 * quantity. Works in cents: every lot but the last is rounded down and the last lot takes the remainder, so the
 * adjustments sum to disallowedLoss exactly and none is negative.
 *
 * If soldAmount is given, only the first soldAmount shares in purchase order are adjusted. A lot that is only partly
 * used is split and its remainder returned with no adjustment.
 */
const applyWashSaleAdjustment = (
  disallowedLoss: number,
  replacementLots: readonly Lot[],
  options: { soldAmount?: number } = {},
): AdjustedLot[] => {
  if (disallowedLoss < 0) {
    throw new RangeError(`Disallowed loss must not be negative: ${disallowedLoss}`)
  }

  const shares = replacementShares(replacementLots, options.soldAmount)
  const replacements = shares.filter(share => share.replacement)
  const totalAmount = replacements.map(share => share.lot.amount).reduce(sum, 0)
  const totalCents = toCents(disallowedLoss)

  if (totalCents > 0 && totalAmount <= epsilon) {
    throw new RangeError(`No replacement shares to absorb a disallowed loss of ${disallowedLoss}`)
  }

  const lastReplacement = replacements[replacements.length - 1]
  let allocated = 0

  return shares.map(({ lot, replacement }) => {
    let adjustmentCents = 0
    if (replacement) {
      adjustmentCents =
        lot === lastReplacement.lot ? totalCents - allocated : Math.floor((totalCents * lot.amount) / totalAmount)
      allocated += adjustmentCents
    }
    return {
      ...lot,
      adjustment: fromCents(adjustmentCents),
      basis: fromCents(toCents(lot.amount * lot.cost.number) + adjustmentCents),
    }
  })
}

export default applyWashSaleAdjustment
