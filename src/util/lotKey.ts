import type Lot from '../@types/Lot.js'

/** Identifies a lot by account, commodity, cost and acquisition date. Lots with equal keys are merged. */
const lotKey = (lot: Pick<Lot, 'account' | 'cur' | 'cost' | 'date'>): string =>
  `${lot.account} ${lot.cur} {${lot.cost.number} ${lot.cost.currency} / ${lot.date}}`

export default lotKey
