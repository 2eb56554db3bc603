import type Entry from './@types/Entry.js'
import type { Balance, Close, Open, Transaction } from './@types/Entry.js'
import type LedgerReport from './@types/LedgerReport.js'
import type { EntryResult } from './@types/LedgerReport.js'
import type Lot from './@types/Lot.js'
import type LotMatch from './@types/LotMatch.js'
import type Posting from './@types/Posting.js'
import type Sale from './@types/Sale.js'
import {
  AccountError,
  BalanceAssertionError,
  InsufficientLotError,
  LedgerError,
  LotNotFoundError,
} from './errors.js'
import matchLots from './matchLots.js'
import Stock from './stock.js'
import sum from './util/sum.js'
import validateTransaction, { defaultTolerance } from './validateTransaction.js'

export interface ValidateLedgerOptions {
  /** Largest per-currency residual a balanced transaction or balance assertion may have. */
  tolerance?: number
}

/** Order of entries on the same date: accounts open first and close last; balances are checked before the day's transactions. */
const typeOrder: { [key in Entry['type']]: number } = {
  open: 0,
  balance: 1,
  transaction: 2,
  close: 3,
}

/** Sorts entries chronologically. Stable, so entries of the same date and type keep their order in the file. */
export const sortEntries = (entries: readonly Entry[]): Entry[] =>
  [...entries].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : typeOrder[a.type] - typeOrder[b.type],
  )

/**
 * Replays a ledger: checks accounts, books reductions against open lots, checks that every transaction balances,
 * and checks balance assertions. Errors are collected per entry; the replay never stops at the first one.
 */
const validateLedger = (entries: readonly Entry[], options: ValidateLedgerOptions = {}): LedgerReport => {
  const tolerance = options.tolerance ?? defaultTolerance
  const stock = Stock()
  const accounts = new Map<string, { open: Open; closed?: Close }>()
  const balances: LedgerReport['balances'] = {}
  const sales: Sale[] = []
  const acquisitions: Lot[] = []

  const addBalance = (account: string, currency: string, number: number) => {
    balances[account] = balances[account] ?? {}
    balances[account][currency] = (balances[account][currency] ?? 0) + number
  }

  /** Returns an error if the account cannot be used on the date, in the currency if one is given. */
  const checkAccount = (account: string, date: string, line: number, currency?: string): AccountError | null => {
    const state = accounts.get(account)
    if (!state) {
      return new AccountError(`Account ${account} is not open`, account, line)
    } else if (state.closed && state.closed.date <= date) {
      return new AccountError(`Account ${account} was closed on ${state.closed.date}`, account, line)
    } else if (currency && state.open.currencies.length > 0 && !state.open.currencies.includes(currency)) {
      return new AccountError(`Currency ${currency} is not allowed in ${account}`, account, line)
    }
    return null
  }

  const open = (entry: Open): LedgerError[] => {
    if (accounts.has(entry.account)) {
      return [new AccountError(`Account ${entry.account} is already open`, entry.account, entry.line)]
    }
    accounts.set(entry.account, { open: entry })
    return []
  }

  const close = (entry: Close): LedgerError[] => {
    const state = accounts.get(entry.account)
    if (!state) {
      return [new AccountError(`Cannot close ${entry.account}: account is not open`, entry.account, entry.line)]
    } else if (state.closed) {
      return [new AccountError(`Account ${entry.account} is already closed`, entry.account, entry.line)]
    }
    state.closed = entry
    return []
  }

  const balance = (entry: Balance): LedgerError[] => {
    const accountError = checkAccount(entry.account, entry.date, entry.line, entry.amount.currency)
    if (accountError) return [accountError]
    const actual = balances[entry.account]?.[entry.amount.currency] ?? 0
    return Math.abs(actual - entry.amount.number) > tolerance
      ? [new BalanceAssertionError(entry.account, entry.amount, actual, entry.line)]
      : []
  }

  /** Finds the lots a reducing posting takes from. Throws LotNotFoundError or InsufficientLotError. */
  const reduce = (posting: Posting): LotMatch[] => {
    const { account, units, cost } = posting
    const candidates = stock
      .lots(account, units.currency)
      .filter(
        lot =>
          (cost?.number == null || (lot.cost.number === cost.number && lot.cost.currency === cost.currency)) &&
          (!cost?.date || lot.date === cost.date),
      )

    if (cost && candidates.length === 0 && (cost.number != null || cost.date)) {
      throw new LotNotFoundError(account, units.currency, cost, cost.date, posting.line)
    }

    return matchLots(candidates, { cur: units.currency, amount: -units.number, line: posting.line })
  }

  const transaction = (entry: Transaction): LedgerError[] => {
    const errors: LedgerError[] = []
    const booked: Posting[] = []
    const deposits: Lot[] = []
    const reducedCurrencies = new Set<string>()
    let bookingFailed = false

    for (const posting of entry.postings) {
      const { account, units, cost, price } = posting

      const accountError = checkAccount(account, entry.date, posting.line, units.currency)
      if (accountError) errors.push(accountError)

      const isReduction = units.number < 0 && (cost != null || stock.holds(account, units.currency))

      // augmentation at cost opens a new lot
      if (units.number > 0 && cost) {
        if (cost.number == null || !cost.currency) {
          errors.push(new LedgerError(`Cost of new lot of ${units.currency} in ${account} is missing`, posting.line))
          bookingFailed = true
          continue
        }
        const lot: Lot = {
          account,
          cur: units.currency,
          amount: units.number,
          cost: { number: cost.number, currency: cost.currency },
          date: cost.date ?? entry.date,
        }
        deposits.push(lot)
        booked.push({ ...posting, cost: { ...lot.cost, date: lot.date } })
      }
      // reduction books against held lots
      else if (isReduction) {
        let matches: LotMatch[]
        try {
          matches = reduce(posting)
        } catch (e) {
          if (!(e instanceof LotNotFoundError || e instanceof InsufficientLotError)) throw e
          errors.push(e)
          bookingFailed = true
          continue
        }
        stock.withdraw(matches)
        reducedCurrencies.add(units.currency)
        booked.push(
          ...matches.map(({ lot, amount }) => ({
            ...posting,
            units: { number: -amount, currency: units.currency },
            cost: { ...lot.cost, date: lot.date },
          })),
        )

        const costCurrency = matches[0]?.lot.cost.currency
        if (price && price.currency === costCurrency) {
          const amount = -units.number
          sales.push({
            date: entry.date,
            account,
            cur: units.currency,
            amount,
            currency: price.currency,
            cost: matches.map(match => match.amount * match.lot.cost.number).reduce(sum, 0),
            proceeds: amount * price.number,
            matches,
            line: posting.line,
          })
        }
      } else {
        booked.push(posting)
      }

      addBalance(account, units.currency, units.number)
    }

    // reductions book against the inventory as it stood before the transaction
    deposits.forEach(lot => stock.deposit(lot))
    acquisitions.push(...deposits.filter(lot => !reducedCurrencies.has(lot.cur)))

    // an unbooked posting has no known weight, so the balance check would only repeat the booking error
    if (!bookingFailed) {
      errors.push(...validateTransaction({ postings: booked, line: entry.line }, { tolerance }).errors)
    }

    return errors
  }

  const results: EntryResult[] = sortEntries(entries).map(entry => {
    const errors =
      entry.type === 'open'
        ? open(entry)
        : entry.type === 'close'
          ? close(entry)
          : entry.type === 'balance'
            ? balance(entry)
            : transaction(entry)
    return { entry, ok: errors.length === 0, errors }
  })

  return { results, lots: stock.all(), balances, sales, acquisitions }
}

export default validateLedger
