import type Amount from './@types/Amount.js'
import type DateString from './@types/DateString.js'
import type Ticker from './@types/Ticker.js'

/** Base class of every violation found in a ledger. line is the 1-based line of the offending entry or posting. */
export class LedgerError extends Error {
  line?: number

  constructor(message: string, line?: number) {
    super(message)
    this.name = new.target.name
    this.line = line
  }
}

/** Malformed syntax. */
export class ParseError extends LedgerError {
  column: number

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`, line)
    this.column = column
  }
}

/** Drops floating point noise from a number shown in a message. */
const round = (n: number) => Number(n.toFixed(8))

/** A transaction whose postings do not sum to zero in some currency. */
export class ImbalanceError extends LedgerError {
  currency: Ticker
  delta: number

  constructor(currency: Ticker, delta: number, line?: number) {
    super(`Transaction does not balance: ${round(delta)} ${currency}`, line)
    this.currency = currency
    this.delta = delta
  }
}

/** A sell larger than the open lots that could cover it. */
export class InsufficientLotError extends LedgerError {
  cur: Ticker
  requested: number
  available: number
  shortfall: number

  constructor(cur: Ticker, requested: number, available: number, line?: number) {
    const shortfall = requested - available
    super(`Insufficient lots of ${cur}: requested ${requested}, available ${available}, short ${shortfall}`, line)
    this.cur = cur
    this.requested = requested
    this.available = available
    this.shortfall = shortfall
  }
}

/** A posting that names a lot by cost or date that is not held. */
export class LotNotFoundError extends LedgerError {
  constructor(account: string, cur: Ticker, cost: Partial<Amount>, date: DateString | undefined, line?: number) {
    const lotText = [cost.number != null ? `${cost.number} ${cost.currency ?? ''}`.trim() : '', date ? `/ ${date}` : '']
      .filter(Boolean)
      .join(' ')
    super(`No lot of ${cur} in ${account} matches {${lotText}}`, line)
  }
}

/** A posting to an account that is not open, or in a currency the account does not allow. */
export class AccountError extends LedgerError {
  account: string

  constructor(message: string, account: string, line?: number) {
    super(message, line)
    this.account = account
  }
}

/** A balance directive that disagrees with the running balance. */
export class BalanceAssertionError extends LedgerError {
  account: string
  expected: Amount
  actual: number

  constructor(account: string, expected: Amount, actual: number, line?: number) {
    super(`Balance of ${account} is ${actual} ${expected.currency}, expected ${expected.number} ${expected.currency}`, line)
    this.account = account
    this.expected = expected
    this.actual = actual
  }
}
