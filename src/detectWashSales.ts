import type LedgerReport from './@types/LedgerReport.js'
import type Lot from './@types/Lot.js'
import type WashSale from './@types/WashSale.js'
import applyWashSaleAdjustment, { replacementShares } from './applyWashSaleAdjustment.js'
import { epsilon } from './matchLots.js'
import byDate from './util/byDate.js'
import { fromCents, toCents } from './util/cents.js'
import daysBetween from './util/daysBetween.js'
import lotKey from './util/lotKey.js'
import sum from './util/sum.js'

/** Replacement purchases must fall within this many days before or after a loss sale. */
export const defaultWindowDays = 30

/**
 * Finds sales at a loss with purchases of the same commodity within the window before or after the sale.
 * Only as many replacement shares as were sold count, beginning with the first shares bought, and a share
 * replaces at most one sold share. The disallowed part of the loss is added to the basis of the replacement lots.
 */
const detectWashSales = (
  report: Pick<LedgerReport, 'sales' | 'acquisitions'>,
  options: { windowDays?: number } = {},
): WashSale[] => {
  const windowDays = options.windowDays ?? defaultWindowDays
  const used = new Map<Lot, number>()
  const washSales: WashSale[] = []

  for (const sale of [...report.sales].sort(byDate)) {
    const lossCents = toCents(sale.cost - sale.proceeds)
    if (lossCents <= 0) continue

    const sold = new Set(sale.matches.map(match => lotKey(match.lot)))
    const candidates = report.acquisitions
      .filter(
        lot =>
          lot.cur === sale.cur &&
          lot.cost.currency === sale.currency &&
          Math.abs(daysBetween(sale.date, lot.date)) <= windowDays &&
          !sold.has(lotKey(lot)) &&
          lot.amount - (used.get(lot) ?? 0) > epsilon,
      )
      .sort(byDate)
    if (candidates.length === 0) continue

    // remaining unused shares of each candidate, in purchase order
    const available = candidates.map(lot => ({ ...lot, amount: lot.amount - (used.get(lot) ?? 0) }))
    const replacementAmount = Math.min(available.map(lot => lot.amount).reduce(sum, 0), sale.amount)
    const disallowedCents = Math.round((lossCents * replacementAmount) / sale.amount)

    const adjustedLots = applyWashSaleAdjustment(fromCents(disallowedCents), available, { soldAmount: sale.amount })

    replacementShares(available, sale.amount)
      .filter(share => share.replacement)
      .forEach(({ lot, index }) => {
        const original = candidates[index]
        used.set(original, (used.get(original) ?? 0) + lot.amount)
      })

    washSales.push({
      sale,
      loss: fromCents(lossCents),
      replacementAmount,
      disallowedLoss: fromCents(disallowedCents),
      allowedLoss: fromCents(lossCents - disallowedCents),
      adjustedLots,
    })
  }

  return washSales
}

export default detectWashSales
