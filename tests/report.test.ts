import fs from 'fs'
import { describe, expect, it } from 'vitest'
import detectWashSales from '../src/detectWashSales.js'
import parseLedger from '../src/parseLedger.js'
import {
  describeEntry,
  exitStatus,
  lotFields,
  lotRows,
  saleRows,
  toCSV,
  violationRows,
  washSaleRows,
} from '../src/report.js'
import validateLedger from '../src/validateLedger.js'

const washSaleLedger = fs.readFileSync(new URL('./fixtures/wash-sale.beancount', import.meta.url), 'utf-8')

describe('report', () => {
  it('describes an entry by its header line', () => {
    const { entries } = parseLedger('2014-01-09 * "Sell" ^lot-1\n  Assets:Cash  1 USD\n  Income:Gains  -1 USD')
    expect(describeEntry(entries[0])).toBe('2014-01-09 * "Sell" ^lot-1')
  })

  it('lists parse errors and violations by line', () => {
    const { entries, errors } = parseLedger(
      [
        '2014-01-01 open Assets:Cash',
        '2014-01-01 open Equity:Opening-Balances',
        '',
        '2014-01-02 * "Unbalanced"',
        '  Assets:Cash  100 USD',
        '  Equity:Opening-Balances  -90 USD',
        '',
        '2014-01-03 bogus',
      ].join('\n'),
    )
    const report = validateLedger(entries)

    expect(violationRows(errors, report.results)).toEqual([
      {
        line: 4,
        column: '',
        entry: '2014-01-02 * "Unbalanced"',
        error: 'ImbalanceError',
        message: 'Transaction does not balance: 10 USD',
      },
      {
        line: 8,
        column: 12,
        entry: '',
        error: 'ParseError',
        message: 'Unrecognized entry keyword "bogus" (line 8, column 12)',
      },
    ])
  })

  it('exits with status 1 only when something was found', () => {
    const clean = parseLedger(washSaleLedger)
    expect(exitStatus(violationRows(clean.errors, validateLedger(clean.entries).results))).toBe(0)

    const broken = parseLedger('2014-01-01 open Assets:Cash\n\n2014-01-03 bogus')
    expect(exitStatus(violationRows(broken.errors, validateLedger(broken.entries).results))).toBe(1)

    const unbalanced = parseLedger('2014-01-01 open Assets:Cash\n\n2014-01-02 * "Gift"\n  Assets:Cash  5 USD')
    expect(exitStatus(violationRows(unbalanced.errors, validateLedger(unbalanced.entries).results))).toBe(1)
  })

  it('writes open lots as CSV', () => {
    const report = validateLedger(parseLedger(washSaleLedger).entries)
    expect(toCSV(lotRows(report.lots), lotFields)).toBe(
      [
        '"Date Acquired","Account","Amount","Commodity","Cost Per Unit","Cost Basis","Currency"',
        '"2013-12-19","Assets:Investments:XYZ",50,"XYZ",65,3250,"USD"',
        '"2013-12-27","Assets:Investments:XYZ",25,"XYZ",55,1375,"USD"',
      ].join('\n'),
    )
  })

  it('computes the gain of each sale', () => {
    const report = validateLedger(parseLedger(washSaleLedger).entries)
    expect(saleRows(report.sales)).toEqual([
      {
        date: '2014-01-09',
        dateAcquired: '2013-09-26',
        account: 'Assets:Investments:XYZ',
        amount: 100,
        cur: 'XYZ',
        proceeds: 4000,
        cost: 5000,
        gain: -1000,
        currency: 'USD',
      },
    ])
  })

  it('writes one wash sale row per replacement lot', () => {
    const report = validateLedger(parseLedger(washSaleLedger).entries)
    const rows = washSaleRows(detectWashSales(report))

    expect(rows.map(row => [row.replacementDate, row.replacementAmount, row.adjustment, row.basis])).toEqual([
      ['2013-12-19', 50, 500, 3250],
      ['2013-12-27', 25, 250, 1375],
    ])
    expect(rows[0]).toMatchObject({ date: '2014-01-09', loss: 1000, disallowedLoss: 750, allowedLoss: 250 })
  })
})
