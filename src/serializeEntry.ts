import type Amount from './@types/Amount.js'
import type Entry from './@types/Entry.js'
import type Posting from './@types/Posting.js'

const quote = (s: string) => `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`

/** Plain decimal notation. The parser does not read exponents such as 1e-7. */
const formatNumber = (n: number) => n.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 })

const formatAmount = (amount: Amount) => `${formatNumber(amount.number)} ${amount.currency}`

const formatPosting = (posting: Posting): string => {
  let s = `  ${posting.account}  ${formatAmount(posting.units)}`
  if (posting.cost) {
    const { number, currency, date } = posting.cost
    const parts = [number != null && currency ? `${formatNumber(number)} ${currency}` : '', date ?? ''].filter(Boolean)
    s += ` {${parts.join(' / ')}}`
  }
  if (posting.price) {
    s += ` @ ${formatAmount(posting.price)}`
  }
  return s
}

/** Writes an entry back to ledger text that parses to the same entry. */
const serializeEntry = (entry: Entry): string => {
  switch (entry.type) {
    case 'open':
      return `${entry.date} open ${entry.account}${entry.currencies.length ? ' ' + entry.currencies.join(',') : ''}`
    case 'close':
      return `${entry.date} close ${entry.account}`
    case 'balance':
      return `${entry.date} balance ${entry.account}  ${formatAmount(entry.amount)}`
    case 'transaction': {
      const header = [
        entry.date,
        entry.flag,
        ...(entry.payee !== undefined ? [quote(entry.payee)] : []),
        quote(entry.narration),
        ...entry.tags.map(tag => `#${tag}`),
        ...entry.links.map(link => `^${link}`),
      ].join(' ')
      return [header, ...entry.postings.map(formatPosting)].join('\n')
    }
  }
}

export default serializeEntry
