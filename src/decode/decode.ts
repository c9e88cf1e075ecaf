// Huffman decoding

import { BitReader } from './bit-reader'
import { rebuildTree } from './tree-rebuilder'
import { canonicalize } from '../code-table'
import { readContainerHeader } from '../container'
import { HuffmanError, formatError } from '../errors'
import type { HuffmanTree } from '../tree'
import { NO_NODE } from '../tree'

export interface HuffmanDecodeOptions {
  maxOutputSize?: number
}

// Reads original_length from the header without decoding
export function huffmanDecodedSize(buffer: Uint8Array): number {
  if (buffer.length < 4) {
    throw formatError(`Truncated header: expected at least 4 bytes, got ${buffer.length}`)
  }
  return new BitReader(buffer).readUint32()
}

// Output is only returned once every symbol decoded, so a corrupt body never
// yields a partial result.
export function huffmanDecode(
  buffer: Uint8Array,
  options: HuffmanDecodeOptions = {}
): Uint8Array {
  const reader = new BitReader(buffer)
  const header = readContainerHeader(reader)

  const { maxOutputSize } = options
  if (maxOutputSize !== undefined && header.originalLength > maxOutputSize) {
    throw new HuffmanError(
      'LIMIT',
      `Decompressed size ${header.originalLength} exceeds limit ${maxOutputSize}`
    )
  }

  const output = new Uint8Array(header.originalLength)
  if (header.originalLength > 0) {
    const table = canonicalize(header.entries)
    const tree = rebuildTree(table)
    decodeSymbols(reader, tree, output)
  }

  if (reader.bytePos !== buffer.length) {
    throw formatError(`Unexpected trailing data: ${buffer.length - reader.bytePos} bytes after the body`)
  }

  return output
}

function decodeSymbols(reader: BitReader, tree: HuffmanTree, output: Uint8Array): void {
  let node = tree.root
  let emitted = 0
  while (emitted < output.length) {
    const next = tree.child(node, reader.readBit())
    if (next === NO_NODE) {
      throw formatError(`Invalid code ending at bit ${reader.pos - 1}`)
    }
    if (tree.isLeaf(next)) {
      output[emitted++] = tree.symbol[next]
      node = tree.root
    } else {
      node = next
    }
  }
}
