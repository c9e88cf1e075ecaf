// Code tables and canonical code assignment

import { ALPHABET_SIZE, MAX_CODE_LENGTH } from './constants'
import { HuffmanError, formatError } from './errors'

export interface SymbolLength {
  symbol: number
  length: number
}

export interface Code extends SymbolLength {
  bits: number  // low `length` bits, read MSB-first
}

export class CodeTable {
  readonly codes: readonly Code[]
  private readonly bySymbol: Array<Code | undefined>

  constructor(codes: readonly Code[]) {
    this.codes = codes
    this.bySymbol = new Array<Code | undefined>(ALPHABET_SIZE).fill(undefined)
    for (const code of codes) {
      if (code.symbol < 0 || code.symbol >= ALPHABET_SIZE) {
        throw formatError(`Symbol ${code.symbol} is outside the ${ALPHABET_SIZE}-symbol alphabet`)
      }
      if (this.bySymbol[code.symbol] !== undefined) {
        throw formatError(`Duplicate symbol ${code.symbol} in code table`)
      }
      this.bySymbol[code.symbol] = code
    }
  }

  get size(): number {
    return this.codes.length
  }

  get(symbol: number): Code {
    const code = symbol >= 0 && symbol < ALPHABET_SIZE ? this.bySymbol[symbol] : undefined
    if (code === undefined) {
      throw new HuffmanError('INPUT', `No code for symbol ${symbol}`)
    }
    return code
  }
}

// Canonical order: shorter codes first, ties by symbol value
export function compareCanonical(a: SymbolLength, b: SymbolLength): number {
  return a.length - b.length || a.symbol - b.symbol
}

// Assigns canonical bit patterns from code lengths alone. The encoder and the
// decoder both come through here, so equal (symbol, length) sets always get
// equal patterns.
export function canonicalize(entries: readonly SymbolLength[]): CodeTable {
  const sorted = [...entries].sort(compareCanonical)
  const codes: Code[] = []

  let next = 0
  let prevLength = 0
  for (const { symbol, length } of sorted) {
    if (!Number.isInteger(length) || length < 1 || length > MAX_CODE_LENGTH) {
      throw formatError(`Invalid code length ${length} for symbol ${symbol}`)
    }
    if (length > prevLength) {
      // Multiply rather than shift: 31-bit values would turn negative under <<
      next *= 2 ** (length - prevLength)
      prevLength = length
    }
    if (next >= 2 ** length) {
      throw formatError('Code lengths are oversubscribed')
    }
    codes.push({ symbol, bits: next, length })
    next++
  }

  return new CodeTable(codes)
}

export function formatCodeBits(code: Code): string {
  return code.bits.toString(2).padStart(code.length, '0')
}
