// Symbol frequency analysis

import { ALPHABET_SIZE, MAX_ORIGINAL_LENGTH } from '../constants'
import { HuffmanError } from '../errors'

export interface Histogram {
  data: Uint32Array  // ALPHABET_SIZE buckets
  totalCount: number
  distinct: number
}

export function createHistogram(): Histogram {
  return {
    data: new Uint32Array(ALPHABET_SIZE),
    totalCount: 0,
    distinct: 0,
  }
}

export function histogramAdd(histogram: Histogram, symbol: number): void {
  if (symbol < 0 || symbol >= ALPHABET_SIZE) {
    throw new HuffmanError('INPUT', `Symbol ${symbol} is outside the ${ALPHABET_SIZE}-symbol alphabet`)
  }
  if (histogram.data[symbol] === 0) {
    histogram.distinct++
  }
  histogram.data[symbol]++
  histogram.totalCount++
}

// Bytes are read unsigned; anything >= ALPHABET_SIZE is rejected with its offset
export function buildHistogram(input: Uint8Array): Histogram {
  if (input.length > MAX_ORIGINAL_LENGTH) {
    throw new HuffmanError('INPUT', `Input length ${input.length} does not fit the container`)
  }

  const histogram = createHistogram()
  for (let i = 0; i < input.length; i++) {
    const symbol = input[i]
    if (symbol >= ALPHABET_SIZE) {
      throw new HuffmanError(
        'INPUT',
        `Byte 0x${symbol.toString(16)} at offset ${i} is outside the ${ALPHABET_SIZE}-symbol alphabet`
      )
    }
    histogramAdd(histogram, symbol)
  }
  return histogram
}

