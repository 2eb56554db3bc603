import type Lot from './@types/Lot.js'
import type LotMatch from './@types/LotMatch.js'
import type Ticker from './@types/Ticker.js'
import { epsilon } from './matchLots.js'
import byDate from './util/byDate.js'
import lotKey from './util/lotKey.js'

/** Tracks open lots, keyed by account, commodity, cost and date. */
const Stock = () => {
  const lotsByKey = new Map<string, Lot>()

  /** Adds a lot. A deposit to an existing key increases that lot. */
  const deposit = (lot: Lot) => {
    const key = lotKey(lot)
    const existing = lotsByKey.get(key)
    lotsByKey.set(key, existing ? { ...existing, amount: existing.amount + lot.amount } : { ...lot })
  }

  /** Removes matched quantities. Emptied lots are closed. */
  const withdraw = (matches: LotMatch[]) => {
    matches.forEach(({ lot, amount }) => {
      const key = lotKey(lot)
      const existing = lotsByKey.get(key)
      if (!existing) {
        throw new Error(`Cannot withdraw from a lot that is not held: ${key}`)
      }
      const remaining = existing.amount - amount
      if (remaining > epsilon) {
        lotsByKey.set(key, { ...existing, amount: remaining })
      } else {
        lotsByKey.delete(key)
      }
    })
  }

  /** Open lots of a commodity in an account, oldest first. */
  const lots = (account: string, cur: Ticker): Lot[] =>
    [...lotsByKey.values()].filter(lot => lot.account === account && lot.cur === cur).sort(byDate)

  /** Returns true if the account holds any lot of the commodity. */
  const holds = (account: string, cur: Ticker): boolean => lots(account, cur).length > 0

  /** All open lots in acquisition order. */
  const all = (): Lot[] => [...lotsByKey.values()].sort(byDate)

  return { deposit, withdraw, lots, holds, all }
}

export default Stock
