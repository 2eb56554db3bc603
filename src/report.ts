import chalk from 'chalk'
import json2csv from 'json2csv'
import type Entry from './@types/Entry.js'
import type { EntryResult } from './@types/LedgerReport.js'
import type Lot from './@types/Lot.js'
import type Sale from './@types/Sale.js'
import type WashSale from './@types/WashSale.js'
import { type LedgerError, ParseError } from './errors.js'
import serializeEntry from './serializeEntry.js'
import { fromCents, toCents } from './util/cents.js'

export interface Field {
  value: string
  label: string
}

/** Convert rows to CSV with a header of field labels. */
export const toCSV = (rows: object[], fields: Field[]): string => json2csv.parse(rows, { delimiter: ',', fields })

const numberWithCommas = (n: number): string => {
  const [whole, fraction] = n.toString().split('.')
  return whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',') + (fraction ? `.${fraction}` : '')
}

/** Formats an amount rounded to cents, green if positive, red if negative. */
export const formatAmount = (n: number, currency: string): string => {
  const text = `${numberWithCommas(fromCents(toCents(n)))} ${currency}`
  return chalk[n > 0 ? 'green' : n < 0 ? 'red' : 'cyan'](text)
}

/** One-line description of an entry: its header line in ledger syntax. */
export const describeEntry = (entry: Entry): string => serializeEntry(entry).split('\n')[0]

export interface ViolationRow {
  line: number | ''
  column: number | ''
  entry: string
  error: string
  message: string
}

const violationRow = (error: LedgerError, entry?: Entry): ViolationRow => ({
  line: error.line ?? entry?.line ?? '',
  column: error instanceof ParseError ? error.column : '',
  entry: entry ? describeEntry(entry) : '',
  error: error.name,
  message: error.message,
})

/** Flattens parse errors and per-entry violations into rows ordered by line. */
export const violationRows = (parseErrors: ParseError[], results: EntryResult[]): ViolationRow[] =>
  [
    ...parseErrors.map(error => violationRow(error)),
    ...results.flatMap(result => result.errors.map(error => violationRow(error, result.entry))),
  ].sort((a, b) => (a.line === '' ? Infinity : a.line) - (b.line === '' ? Infinity : b.line))

/** Process exit status for a run: 1 if anything was found, else 0. */
export const exitStatus = (violations: ViolationRow[]): number => (violations.length > 0 ? 1 : 0)

export const violationFields: Field[] = [
  { value: 'line', label: 'Line' },
  { value: 'column', label: 'Column' },
  { value: 'entry', label: 'Entry' },
  { value: 'error', label: 'Error' },
  { value: 'message', label: 'Message' },
]

export const lotRows = (lots: Lot[]) =>
  lots.map(lot => ({
    account: lot.account,
    cur: lot.cur,
    amount: lot.amount,
    cost: lot.cost.number,
    currency: lot.cost.currency,
    date: lot.date,
    basis: fromCents(toCents(lot.amount * lot.cost.number)),
  }))

export const lotFields: Field[] = [
  { value: 'date', label: 'Date Acquired' },
  { value: 'account', label: 'Account' },
  { value: 'amount', label: 'Amount' },
  { value: 'cur', label: 'Commodity' },
  { value: 'cost', label: 'Cost Per Unit' },
  { value: 'basis', label: 'Cost Basis' },
  { value: 'currency', label: 'Currency' },
]

export const saleRows = (sales: Sale[]) =>
  sales.map(sale => ({
    date: sale.date,
    dateAcquired: sale.matches.map(match => match.lot.date).join(' '),
    account: sale.account,
    amount: sale.amount,
    cur: sale.cur,
    proceeds: fromCents(toCents(sale.proceeds)),
    cost: fromCents(toCents(sale.cost)),
    gain: fromCents(toCents(sale.proceeds) - toCents(sale.cost)),
    currency: sale.currency,
  }))

export const saleFields: Field[] = [
  { value: 'date', label: 'Date Sold' },
  { value: 'dateAcquired', label: 'Date Acquired' },
  { value: 'account', label: 'Account' },
  { value: 'amount', label: 'Amount' },
  { value: 'cur', label: 'Commodity' },
  { value: 'proceeds', label: 'Proceeds' },
  { value: 'cost', label: 'Cost Basis' },
  { value: 'gain', label: 'Gain' },
  { value: 'currency', label: 'Currency' },
]

/** One row per adjusted replacement lot. */
export const washSaleRows = (washSales: WashSale[]) =>
  washSales.flatMap(washSale =>
    washSale.adjustedLots.map(lot => ({
      date: washSale.sale.date,
      cur: washSale.sale.cur,
      amount: washSale.sale.amount,
      loss: washSale.loss,
      disallowedLoss: washSale.disallowedLoss,
      allowedLoss: washSale.allowedLoss,
      replacementDate: lot.date,
      replacementAmount: lot.amount,
      adjustment: lot.adjustment,
      basis: lot.basis,
    })),
  )

export const washSaleFields: Field[] = [
  { value: 'date', label: 'Date Sold' },
  { value: 'amount', label: 'Amount Sold' },
  { value: 'cur', label: 'Commodity' },
  { value: 'loss', label: 'Loss' },
  { value: 'disallowedLoss', label: 'Disallowed Loss' },
  { value: 'allowedLoss', label: 'Allowed Loss' },
  { value: 'replacementDate', label: 'Replacement Date' },
  { value: 'replacementAmount', label: 'Replacement Amount' },
  { value: 'adjustment', label: 'Basis Adjustment' },
  { value: 'basis', label: 'Adjusted Basis' },
]
