import fs from 'fs'
import { describe, expect, it } from 'vitest'
import {
  AccountError,
  BalanceAssertionError,
  ImbalanceError,
  InsufficientLotError,
  LotNotFoundError,
} from '../src/errors.js'
import parseEntries from '../src/parseEntries.js'
import validateLedger, { sortEntries } from '../src/validateLedger.js'

const washSaleLedger = fs.readFileSync(new URL('./fixtures/wash-sale.beancount', import.meta.url), 'utf-8')

const accounts = [
  '2013-01-01 open Assets:Cash USD',
  '2013-01-01 open Assets:XYZ',
  '2013-01-01 open Equity:Opening-Balances',
  '2013-01-01 open Income:Gains',
  '',
].join('\n')

const validate = (text: string) => validateLedger(parseEntries(accounts + text))

const failures = (text: string) => validate(text).results.filter(result => !result.ok)

describe('validateLedger', () => {
  it('passes the wash sale ledger', () => {
    const report = validateLedger(parseEntries(washSaleLedger))
    expect(report.results.filter(result => !result.ok)).toEqual([])
    expect(report.results).toHaveLength(13)
  })

  it('replays lots to the adjusted bases', () => {
    const report = validateLedger(parseEntries(washSaleLedger))
    expect(report.lots).toEqual([
      {
        account: 'Assets:Investments:XYZ',
        cur: 'XYZ',
        amount: 50,
        cost: { number: 65, currency: 'USD' },
        date: '2013-12-19',
      },
      {
        account: 'Assets:Investments:XYZ',
        cur: 'XYZ',
        amount: 25,
        cost: { number: 55, currency: 'USD' },
        date: '2013-12-27',
      },
    ])
    expect(report.balances['Assets:Investments:Cash']).toEqual({ USD: 15125 })
  })

  it('records purchases and the sale with its proceeds', () => {
    const report = validateLedger(parseEntries(washSaleLedger))
    expect(report.acquisitions.map(lot => [lot.date, lot.amount, lot.cost.number])).toEqual([
      ['2013-09-26', 100, 50],
      ['2013-12-19', 50, 55],
      ['2013-12-27', 25, 45],
    ])
    expect(report.sales).toHaveLength(1)
    expect(report.sales[0]).toMatchObject({
      date: '2014-01-09',
      cur: 'XYZ',
      amount: 100,
      currency: 'USD',
      cost: 5000,
      proceeds: 4000,
    })
  })

  it('matches a sell without a lot reference first in, first out', () => {
    const report = validate(
      [
        '2014-01-02 * "Buy"',
        '  Assets:XYZ  50 XYZ {10 USD}',
        '  Assets:Cash  -500 USD',
        '',
        '2014-01-03 * "Buy"',
        '  Assets:XYZ  25 XYZ {12 USD}',
        '  Assets:Cash  -300 USD',
        '',
        '2014-02-01 * "Sell"',
        '  Assets:XYZ  -60 XYZ @ 15 USD',
        '  Assets:Cash  900 USD',
        '  Income:Gains  -280 USD',
      ].join('\n'),
    )

    expect(report.results.every(result => result.ok)).toBe(true)
    expect(report.sales[0].matches.map(match => [match.lot.date, match.amount])).toEqual([
      ['2014-01-02', 50],
      ['2014-01-03', 10],
    ])
    expect(report.lots.map(lot => [lot.date, lot.amount])).toEqual([['2014-01-03', 15]])
  })

  it('reports a sell larger than the open lots', () => {
    const [failure] = failures(
      [
        '2014-01-02 * "Buy"',
        '  Assets:XYZ  10 XYZ {10 USD}',
        '  Assets:Cash  -100 USD',
        '',
        '2014-02-01 * "Sell"',
        '  Assets:XYZ  -12 XYZ {}',
        '  Assets:Cash  120 USD',
      ].join('\n'),
    )

    expect(failure.errors).toHaveLength(1)
    expect(failure.errors[0]).toBeInstanceOf(InsufficientLotError)
    expect(failure.errors[0]).toMatchObject({ shortfall: 2, line: 10 })
  })

  it('reports a lot reference that is not held', () => {
    const [failure] = failures(
      [
        '2014-01-02 * "Buy"',
        '  Assets:XYZ  10 XYZ {10 USD}',
        '  Assets:Cash  -100 USD',
        '',
        '2014-02-01 * "Sell"',
        '  Assets:XYZ  -10 XYZ {10 USD / 2014-01-05}',
        '  Assets:Cash  100 USD',
      ].join('\n'),
    )

    expect(failure.errors.map(error => error.message)).toEqual([
      'No lot of XYZ in Assets:XYZ matches {10 USD / 2014-01-05}',
    ])
    expect(failure.errors[0]).toBeInstanceOf(LotNotFoundError)
  })

  it('books reductions against the lots held before the transaction', () => {
    const report = validate(
      [
        '2014-01-01 * "Buy"',
        '  Assets:XYZ  10 XYZ {10 USD}',
        '  Assets:Cash  -100 USD',
        '',
        '2014-01-05 * "Swap lots"',
        '  Assets:XYZ  10 XYZ {20 USD / 2013-12-01}',
        '  Assets:XYZ  -10 XYZ {}',
        '  Assets:Cash  -100 USD',
      ].join('\n'),
    )

    expect(report.results.filter(result => !result.ok)).toEqual([])
    expect(report.lots).toEqual([
      { account: 'Assets:XYZ', cur: 'XYZ', amount: 10, cost: { number: 20, currency: 'USD' }, date: '2013-12-01' },
    ])
  })

  it('reports an unbalanced transaction with the currency and delta', () => {
    const [failure] = failures(['2014-01-02 * "Typo"', '  Assets:Cash  100 USD', '  Equity:Opening-Balances  -10 USD'].join('\n'))

    expect(failure.entry.line).toBe(5)
    expect(failure.errors[0]).toBeInstanceOf(ImbalanceError)
    expect(failure.errors[0]).toMatchObject({ currency: 'USD', delta: 90 })
  })

  it('reports postings to accounts that are not open, closed or restricted', () => {
    const results = failures(
      [
        '2014-01-02 * "Unknown account"',
        '  Assets:Savings  10 USD',
        '  Equity:Opening-Balances  -10 USD',
        '',
        '2014-01-03 * "Wrong currency"',
        '  Assets:Cash  10 EUR',
        '  Equity:Opening-Balances  -10 EUR',
        '',
        '2014-01-04 close Income:Gains',
        '',
        '2014-01-05 * "Closed account"',
        '  Income:Gains  -10 USD',
        '  Assets:Cash  10 USD',
      ].join('\n'),
    )

    expect(results.map(result => result.errors.map(error => error.message))).toEqual([
      ['Account Assets:Savings is not open'],
      ['Currency EUR is not allowed in Assets:Cash'],
      ['Account Income:Gains was closed on 2014-01-04'],
    ])
    expect(results[0].errors[0]).toBeInstanceOf(AccountError)
  })

  it('checks balance assertions at the start of the day', () => {
    const results = failures(
      [
        '2014-01-02 * "Deposit"',
        '  Assets:Cash  100 USD',
        '  Equity:Opening-Balances  -100 USD',
        '',
        '2014-01-02 balance Assets:Cash  100 USD',
        '2014-01-03 balance Assets:Cash  100 USD',
      ].join('\n'),
    )

    expect(results).toHaveLength(1)
    expect(results[0].entry.line).toBe(9)
    expect(results[0].errors[0]).toBeInstanceOf(BalanceAssertionError)
    expect(results[0].errors[0].message).toBe('Balance of Assets:Cash is 0 USD, expected 100 USD')
  })

  it('reports every violation in one pass', () => {
    const results = failures(
      [
        '2014-01-02 * "Unbalanced"',
        '  Assets:Cash  100 USD',
        '  Equity:Opening-Balances  -90 USD',
        '',
        '2014-01-03 * "Oversold"',
        '  Assets:XYZ  -1 XYZ {}',
        '  Assets:Cash  1 USD',
      ].join('\n'),
    )
    expect(results.map(result => result.errors[0].name)).toEqual(['ImbalanceError', 'InsufficientLotError'])
  })
})

describe('sortEntries', () => {
  it('orders opens before balances before transactions before closes on the same date', () => {
    const entries = parseEntries(
      [
        '2014-01-02 close Assets:Cash',
        '2014-01-02 * "Deposit"',
        '  Assets:Cash  1 USD',
        '  Equity:Opening-Balances  -1 USD',
        '2014-01-02 balance Assets:Cash  0 USD',
        '2014-01-01 open Assets:Cash',
      ].join('\n'),
    )
    expect(sortEntries(entries).map(entry => entry.type)).toEqual(['open', 'balance', 'transaction', 'close'])
  })
})
