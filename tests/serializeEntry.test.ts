import { describe, expect, it } from 'vitest'
import type Entry from '../src/@types/Entry.js'
import parseEntries from '../src/parseEntries.js'
import serializeEntry from '../src/serializeEntry.js'

/** Drops line numbers, which change when an entry is written on its own. */
const withoutLines = (entry: Entry) =>
  entry.type === 'transaction'
    ? { ...entry, line: 0, postings: entry.postings.map(posting => ({ ...posting, line: 0 })) }
    : { ...entry, line: 0 }

describe('serializeEntry', () => {
  it('writes a transaction in ledger syntax', () => {
    const [tx] = parseEntries(
      [
        '2014-01-09 * "Broker" "Sell \\"XYZ\\"" #trades ^lot-1',
        '    Assets:Investments:XYZ   -100 XYZ {50.00 USD / 2013-09-26} @ 40.00 USD',
        '    Assets:Investments:Cash  4000.00 USD',
        '    Expenses:Losses          1000 USD',
      ].join('\n'),
    )

    expect(serializeEntry(tx)).toBe(
      [
        '2014-01-09 * "Broker" "Sell \\"XYZ\\"" #trades ^lot-1',
        '  Assets:Investments:XYZ  -100 XYZ {50 USD / 2013-09-26} @ 40 USD',
        '  Assets:Investments:Cash  4000 USD',
        '  Expenses:Losses  1000 USD',
      ].join('\n'),
    )
  })

  it('writes very small and very large numbers without an exponent', () => {
    const text = [
      '2014-01-01 * "Dust"',
      '  Assets:Wallet  0.0000001 BTC {30000000000000000000000 USD}',
      '  Equity:Opening-Balances  -3000000000000000 USD',
    ].join('\n')
    const [tx] = parseEntries(text)

    expect(serializeEntry(tx)).toBe(text)
    expect(parseEntries(serializeEntry(tx)).map(withoutLines)).toEqual([withoutLines(tx)])
  })

  it('writes open, close and balance entries', () => {
    const text = [
      '2013-01-01 open Assets:Cash USD,EUR',
      '2013-01-01 open Equity:Opening-Balances',
      '2014-01-01 balance Assets:Cash  -12.5 USD',
      '2015-01-01 close Assets:Cash',
    ].join('\n')
    expect(parseEntries(text).map(serializeEntry).join('\n')).toBe(text)
  })

  it('preserves date, narration, links and postings through a round trip', () => {
    const entries = parseEntries(
      [
        '2013-12-19 ! "Buy 50 shares" #xyz ^wash-1 ^wash-2',
        '  Assets:Investments:XYZ  50 XYZ {55.00 USD}',
        '  Assets:Investments:XYZ  -5 XYZ {}',
        '  Assets:Investments:Cash  -2,475.00 USD',
      ].join('\n'),
    )
    const roundTrip = entries.flatMap(entry => parseEntries(serializeEntry(entry)))

    expect(roundTrip.map(withoutLines)).toEqual(entries.map(withoutLines))
  })
})
