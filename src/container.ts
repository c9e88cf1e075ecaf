// Container header layout
//
// [0:4)  original_length  u32, big-endian
// [4:5)  symbol_count     u8
// then symbol_count x (symbol u8, code_length u8), in canonical order,
// then the packed body, MSB-first, zero-padded to a byte boundary.

import { BitWriter } from './encode/bit-writer'
import { BitReader } from './decode/bit-reader'
import { compareCanonical } from './code-table'
import type { SymbolLength } from './code-table'
import {
  ALPHABET_SIZE,
  FIXED_HEADER_SIZE,
  MAX_CODE_LENGTH,
  MAX_ORIGINAL_LENGTH,
  containerHeaderSize,
} from './constants'
import { HuffmanError, formatError } from './errors'

export interface ContainerHeader {
  originalLength: number
  entries: readonly SymbolLength[]
}

export function writeContainerHeader(writer: BitWriter, header: ContainerHeader): void {
  const { originalLength, entries } = header
  if (originalLength < 0 || originalLength > MAX_ORIGINAL_LENGTH) {
    throw new HuffmanError('INPUT', `Input length ${originalLength} does not fit the container`)
  }
  if (entries.length > ALPHABET_SIZE) {
    throw new HuffmanError('CAPACITY', `${entries.length} symbols exceed the ${ALPHABET_SIZE}-symbol alphabet`)
  }

  writer.writeUint32(originalLength)
  writer.writeByte(entries.length)
  for (const { symbol, length } of entries) {
    writer.writeByte(symbol)
    writer.writeByte(length)
  }
}

export function readContainerHeader(reader: BitReader): ContainerHeader {
  const available = reader.buffer.length
  if (available < FIXED_HEADER_SIZE) {
    throw formatError(`Truncated header: expected at least ${FIXED_HEADER_SIZE} bytes, got ${available}`)
  }

  const originalLength = reader.readUint32()
  const symbolCount = reader.readByte()
  if (symbolCount > ALPHABET_SIZE) {
    throw formatError(`Symbol count ${symbolCount} exceeds the ${ALPHABET_SIZE}-symbol alphabet`)
  }

  const needed = containerHeaderSize(symbolCount)
  if (available < needed) {
    throw formatError(`Truncated header: ${symbolCount} symbols need ${needed} bytes, got ${available}`)
  }

  const entries: SymbolLength[] = []
  for (let i = 0; i < symbolCount; i++) {
    const symbol = reader.readByte()
    const length = reader.readByte()
    if (symbol >= ALPHABET_SIZE) {
      throw formatError(`Symbol ${symbol} is outside the ${ALPHABET_SIZE}-symbol alphabet`)
    }
    if (length < 1 || length > MAX_CODE_LENGTH) {
      throw formatError(`Invalid code length ${length} for symbol ${symbol}`)
    }
    const entry = { symbol, length }
    const prev = entries[entries.length - 1]
    if (prev !== undefined && compareCanonical(prev, entry) >= 0) {
      throw formatError(`Header entry for symbol ${symbol} is out of canonical order`)
    }
    entries.push(entry)
  }

  if ((originalLength === 0) !== (symbolCount === 0)) {
    throw formatError(`Original length ${originalLength} is inconsistent with ${symbolCount} symbols`)
  }

  return { originalLength, entries }
}
