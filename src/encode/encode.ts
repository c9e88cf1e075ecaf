// Huffman encoder API

import { BitWriter } from './bit-writer'
import { buildHistogram } from './histogram'
import type { Histogram } from './histogram'
import { buildHuffmanTree, codeTableFromTree } from './tree-builder'
import { canonicalize } from '../code-table'
import type { CodeTable } from '../code-table'
import { ALPHABET_SIZE, containerHeaderSize } from '../constants'
import { writeContainerHeader } from '../container'
import { formatCodeTable, formatHistogram, formatTree } from '../debug'
import type { DebugFlags } from '../debug'

export interface HuffmanEncodeOptions {
  debug?: DebugFlags                 // default: no dumps
  log?: (message: string) => void    // default: console.error
}

// Compress data into a Huffman container.
// Throws HuffmanError('INPUT') on bytes >= 128; never returns a partial container.
export function huffmanEncode(
  input: Uint8Array,
  options: HuffmanEncodeOptions = {}
): Uint8Array {
  const debug = options.debug ?? {}
  const log = options.log ?? ((message: string) => console.error(message))

  const histogram = buildHistogram(input)
  if (debug.freq) {
    log(formatHistogram(histogram))
  }

  if (histogram.distinct === 0) {
    return encodeEmptyInput()
  }

  const tree = buildHuffmanTree(histogram)
  if (debug.tree) {
    log(formatTree(tree))
  }

  const table = canonicalize(codeTableFromTree(tree).codes)
  if (debug.code) {
    log(formatCodeTable(table))
  }

  const headerSize = containerHeaderSize(table.size)
  const bodySize = Math.ceil(bodyBitLength(histogram, table) / 8)
  const writer = new BitWriter(headerSize + bodySize)
  writeContainerHeader(writer, { originalLength: input.length, entries: table.codes })
  storeBody(writer, input, table)

  return writer.finish()
}

function encodeEmptyInput(): Uint8Array {
  const writer = new BitWriter(containerHeaderSize(0))
  writeContainerHeader(writer, { originalLength: 0, entries: [] })
  return writer.finish()
}

function bodyBitLength(histogram: Histogram, table: CodeTable): number {
  let bits = 0
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = histogram.data[symbol]
    if (count > 0) {
      bits += count * table.get(symbol).length
    }
  }
  return bits
}

function storeBody(writer: BitWriter, input: Uint8Array, table: CodeTable): void {
  // Flat per-symbol lookups for the hot loop
  const lengths = new Uint8Array(ALPHABET_SIZE)
  const bits = new Uint32Array(ALPHABET_SIZE)
  for (const code of table.codes) {
    lengths[code.symbol] = code.length
    bits[code.symbol] = code.bits
  }

  for (let i = 0; i < input.length; i++) {
    const symbol = input[i]
    writer.writeBits(lengths[symbol], bits[symbol])
  }
}
