import { ParseError } from './errors.js'

export interface Token {
  text: string
  /** 1-based column of the first character. */
  column: number
  quoted: boolean
}

/** Single-character tokens. @@ is read as one token. */
const punctuation = new Set(['{', '}', '@', ',', '/', '|'])

const isNumberPrefix = (word: string) => /^[+-]?[\d,]*\d$/.test(word)

/**
 * Splits one line of ledger text into tokens. Everything after an unquoted ; is a comment.
 * Quoted strings support \" and \\ escapes.
 */
const tokenize = (line: string, lineNumber: number): Token[] => {
  const tokens: Token[] = []
  let i = 0

  while (i < line.length) {
    const c = line[i]

    if (c === ' ' || c === '\t' || c === '\r') {
      i++
    } else if (c === ';') {
      break
    } else if (c === '"') {
      const start = i
      let text = ''
      i++
      while (i < line.length && line[i] !== '"') {
        if (line[i] === '\\' && i + 1 < line.length) i++
        text += line[i]
        i++
      }
      if (i >= line.length) {
        throw new ParseError('Unterminated string', lineNumber, start + 1)
      }
      i++
      tokens.push({ text, column: start + 1, quoted: true })
    } else if (c === '@' && line[i + 1] === '@') {
      tokens.push({ text: '@@', column: i + 1, quoted: false })
      i += 2
    } else if (punctuation.has(c)) {
      tokens.push({ text: c, column: i + 1, quoted: false })
      i++
    } else {
      const start = i
      let text = ''
      while (i < line.length) {
        const d = line[i]
        // thousands separators stay inside a number
        const isGroupComma = d === ',' && isNumberPrefix(text) && /\d/.test(line[i + 1] ?? '')
        if (!isGroupComma && (d === ' ' || d === '\t' || d === '\r' || d === ';' || d === '"' || punctuation.has(d))) {
          break
        }
        text += d
        i++
      }
      tokens.push({ text, column: start + 1, quoted: false })
    }
  }

  return tokens
}

export default tokenize
