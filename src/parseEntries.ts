import type Entry from './@types/Entry.js'
import parseLedger from './parseLedger.js'

/** Parses ledger text into entries. Throws the first ParseError in the text. */
const parseEntries = (text: string): Entry[] => {
  const { entries, errors } = parseLedger(text)
  if (errors.length > 0) throw errors[0]
  return entries
}

export default parseEntries
