import type Amount from './@types/Amount.js'
import type CostSpec from './@types/CostSpec.js'
import type Entry from './@types/Entry.js'
import type { Flag, Transaction } from './@types/Entry.js'
import type Posting from './@types/Posting.js'
import { ParseError } from './errors.js'
import tokenize, { type Token } from './tokenize.js'
import isValidDate from './util/isValidDate.js'

export interface ParsedLedger {
  entries: Entry[]
  /** Values of option "name" "value" lines. */
  options: { [key: string]: string }
  errors: ParseError[]
}

const accountRegex = /^(Assets|Liabilities|Equity|Income|Expenses)(:[A-Z0-9][A-Za-z0-9-]*)+$/
const currencyRegex = /^[A-Z][A-Z0-9'._-]{0,22}[A-Z0-9]$|^[A-Z]$/
const numberRegex = /^[+-]?(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/

interface TokenReader {
  peek(): Token | undefined
  next(expected: string): Token
  /** Consumes the next token if it is the given punctuation. */
  accept(text: string): boolean
  done(): boolean
  /** Throws a ParseError at the current token, or past the end of the line. */
  fail(message: string, token?: Token): never
  date(): string
  account(): string
  number(): number
  currency(): string
  amount(): Amount
  string(): string
  end(): void
}

/** Reads tokens left to right, reporting the column of the token that does not fit. */
const TokenReader = (tokens: Token[], line: number, lineLength: number): TokenReader => {
  let i = 0

  const peek = (): Token | undefined => tokens[i]

  const done = () => i >= tokens.length

  const fail = (message: string, token: Token | undefined = tokens[i]): never => {
    throw new ParseError(message, line, token ? token.column : lineLength + 1)
  }

  const next = (expected: string): Token => {
    const token = tokens[i]
    if (!token) return fail(`Expected ${expected}`)
    i++
    return token
  }

  const accept = (text: string): boolean => {
    const token = tokens[i]
    if (token && !token.quoted && token.text === text) {
      i++
      return true
    }
    return false
  }

  /** Consumes the next token, failing unless it is unquoted and matches the pattern. */
  const expectToken = (expected: string, valid: (text: string) => boolean, message: string): string => {
    const token = next(expected)
    return token.quoted || !valid(token.text) ? fail(`${message} "${token.text}"`, token) : token.text
  }

  const date = () => expectToken('date', isValidDate, 'Invalid date')

  const account = () => expectToken('account', text => accountRegex.test(text), 'Invalid account')

  const number = () => parseFloat(expectToken('number', text => numberRegex.test(text), 'Invalid amount').replace(/,/g, ''))

  const currency = () => expectToken('currency', text => currencyRegex.test(text), 'Invalid currency')

  const amount = (): Amount => {
    const n = number()
    return { number: n, currency: currency() }
  }

  const string = (): string => {
    const token = next('string')
    return token.quoted ? token.text : fail('Expected a quoted string', token)
  }

  const end = () => {
    if (!done()) fail(`Unexpected "${tokens[i].text}"`)
  }

  return { peek, next, accept, done, fail, date, account, number, currency, amount, string, end }
}

/** Parses the contents of {...} after the opening brace has been consumed. */
const parseCost = (reader: TokenReader): CostSpec => {
  const cost: CostSpec = {}
  while (!reader.accept('}')) {
    const token = reader.peek()
    if (!token) reader.fail('Expected "}"')
    if (reader.accept(',') || reader.accept('/')) continue
    if (isValidDate(token.text) && !token.quoted) {
      if (cost.date) reader.fail('Duplicate lot date', token)
      cost.date = reader.date()
    } else {
      if (cost.number != null) reader.fail('Duplicate lot cost', token)
      const { number, currency } = reader.amount()
      cost.number = number
      cost.currency = currency
    }
  }
  return cost
}

/** Parses an indented posting line: <ACCOUNT> <AMOUNT> <CUR> [{cost}] [@ price | @@ total]. */
const parsePosting = (reader: TokenReader, line: number): Posting => {
  const account = reader.account()
  const units = reader.amount()
  const posting: Posting = { account, units, line }

  if (reader.accept('{')) {
    posting.cost = parseCost(reader)
  }

  if (reader.accept('@')) {
    posting.price = reader.amount()
  } else if (reader.accept('@@')) {
    const total = reader.amount()
    posting.price = {
      number: units.number === 0 ? 0 : Math.abs(total.number / units.number),
      currency: total.currency,
    }
  }

  reader.end()
  return posting
}

/** Parses the header line of a transaction. The date and flag have already been consumed. */
const parseTransactionHeader = (reader: TokenReader, date: string, flag: Flag, line: number): Transaction => {
  const strings: string[] = []
  const tags: string[] = []
  const links: string[] = []

  while (!reader.done()) {
    const token = reader.next('narration')
    if (token.quoted) {
      if (tags.length || links.length) reader.fail('Narration must come before tags and links', token)
      if (strings.length === 2) reader.fail('Too many strings in transaction header', token)
      strings.push(token.text)
    }
    // payee | narration
    else if (token.text === '|' && strings.length === 1) {
      continue
    } else if (/^#[A-Za-z0-9_.-]+$/.test(token.text)) {
      tags.push(token.text.slice(1))
    } else if (/^\^[A-Za-z0-9_.-]+$/.test(token.text)) {
      links.push(token.text.slice(1))
    } else {
      reader.fail(`Unexpected "${token.text}"`, token)
    }
  }

  return {
    type: 'transaction',
    date,
    flag,
    ...(strings.length === 2 ? { payee: strings[0] } : null),
    narration: strings.length === 2 ? strings[1] : (strings[0] ?? ''),
    tags,
    links,
    postings: [],
    line,
  }
}

/** Parses an unindented line. Returns null for option lines, which are stored directly. */
const parseDirective = (reader: TokenReader, line: number, options: ParsedLedger['options']): Entry | null => {
  const first = reader.peek()
  if (first && !first.quoted && first.text === 'option') {
    reader.next('option')
    const name = reader.string()
    const value = reader.string()
    reader.end()
    options[name] = value
    return null
  }

  const date = reader.date()
  const keyword = reader.next('directive')

  switch (keyword.quoted ? '' : keyword.text) {
    case 'open': {
      const account = reader.account()
      const currencies: string[] = []
      while (!reader.done()) {
        if (currencies.length > 0 && !reader.accept(',')) reader.fail('Expected ","')
        currencies.push(reader.currency())
      }
      return { type: 'open', date, account, currencies, line }
    }
    case 'close': {
      const account = reader.account()
      reader.end()
      return { type: 'close', date, account, line }
    }
    case 'balance': {
      const account = reader.account()
      const amount = reader.amount()
      reader.end()
      return { type: 'balance', date, account, amount, line }
    }
    case '*':
    case 'txn':
      return parseTransactionHeader(reader, date, '*', line)
    case '!':
      return parseTransactionHeader(reader, date, '!', line)
    default:
      return reader.fail(`Unrecognized entry keyword "${keyword.text}"`, keyword)
  }
}

/**
 * Parses ledger text into entries, collecting every ParseError.
 * A block with an error is skipped up to the next unindented or blank line.
 */
const parseLedger = (text: string): ParsedLedger => {
  const entries: Entry[] = []
  const options: ParsedLedger['options'] = {}
  const errors: ParseError[] = []

  let current: Transaction | null = null
  let skipping = false

  const lines = text.split('\n')
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i]
    const line = i + 1

    try {
      const tokens = tokenize(raw, line)
      const indented = /^[ \t]/.test(raw)

      // blank line ends a block
      if (raw.trim() === '') {
        current = null
        skipping = false
        continue
      }
      // comment
      if (tokens.length === 0) continue

      if (indented) {
        if (skipping) continue
        if (!current) throw new ParseError('Posting outside of a transaction', line, tokens[0].column)
        current.postings.push(parsePosting(TokenReader(tokens, line, raw.length), line))
        continue
      }

      current = null
      skipping = false

      // outline heading
      if (raw.startsWith('*')) continue

      const entry = parseDirective(TokenReader(tokens, line, raw.length), line, options)
      if (!entry) continue
      entries.push(entry)
      if (entry.type === 'transaction') {
        current = entry
      }
    } catch (e) {
      if (!(e instanceof ParseError)) throw e
      errors.push(e)
      // drop the whole block containing the error
      if (current) {
        entries.splice(entries.indexOf(current), 1)
        current = null
      }
      skipping = true
    }
  }

  return { entries, options, errors }
}

export default parseLedger
