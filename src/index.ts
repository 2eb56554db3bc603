export type { default as AdjustedLot } from './@types/AdjustedLot.js'
export type { default as Amount } from './@types/Amount.js'
export type { default as CostSpec } from './@types/CostSpec.js'
export type { default as Entry, Balance, Close, Flag, Open, Transaction } from './@types/Entry.js'
export type { default as LedgerReport, EntryResult } from './@types/LedgerReport.js'
export type { default as Lot } from './@types/Lot.js'
export type { default as LotMatch } from './@types/LotMatch.js'
export type { default as Posting } from './@types/Posting.js'
export type { default as Sale } from './@types/Sale.js'
export type { default as WashSale } from './@types/WashSale.js'
export { default as applyWashSaleAdjustment } from './applyWashSaleAdjustment.js'
export { default as detectWashSales } from './detectWashSales.js'
export * from './errors.js'
export { default as matchLots } from './matchLots.js'
export { default as parseEntries } from './parseEntries.js'
export { default as parseLedger } from './parseLedger.js'
export { default as serializeEntry } from './serializeEntry.js'
export { default as validateLedger } from './validateLedger.js'
export { default as validateTransaction } from './validateTransaction.js'
