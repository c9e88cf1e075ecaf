// Diagnostic dumps of the intermediate structures
//
// Observational only: nothing here feeds back into the container bytes.

import { formatCodeBits } from './code-table'
import type { CodeTable } from './code-table'
import { ALPHABET_SIZE } from './constants'
import type { Histogram } from './encode/histogram'
import type { HuffmanTree } from './tree'

export interface DebugFlags {
  freq?: boolean
  tree?: boolean
  code?: boolean
}

const ESCAPES: Record<number, string> = {
  0x00: '\\0',
  0x08: '\\b',
  0x09: '\\t',
  0x0A: '\\n',
  0x0B: '\\v',
  0x0C: '\\f',
  0x0D: '\\r',
  0x27: "\\'",
  0x5C: '\\\\',
}

export function escapeSymbol(symbol: number): string {
  const escaped = ESCAPES[symbol]
  if (escaped !== undefined) {
    return escaped
  }
  if (symbol >= 0x20 && symbol < 0x7F) {
    return String.fromCharCode(symbol)
  }
  return `\\x${symbol.toString(16).padStart(2, '0')}`
}

export function formatHistogram(histogram: Histogram): string {
  const lines = ['Freq table:']
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = histogram.data[symbol]
    if (count > 0) {
      lines.push(`'${escapeSymbol(symbol)}' -> ${count}`)
    }
  }
  return lines.join('\n')
}

// Pre-order, two spaces of indent per level
export function formatTree(tree: HuffmanTree): string {
  const lines = ['Huffman tree:']
  const nodes: number[] = [tree.root]
  const depths: number[] = [0]

  let node = nodes.pop()
  let depth = depths.pop()
  while (node !== undefined && depth !== undefined) {
    const indent = '  '.repeat(depth)
    if (tree.isLeaf(node)) {
      lines.push(`${indent}('${escapeSymbol(tree.symbol[node])}': ${tree.weight[node]})`)
    } else {
      lines.push(`${indent}(${tree.weight[node]})`)
      nodes.push(tree.right[node], tree.left[node])
      depths.push(depth + 1, depth + 1)
    }
    node = nodes.pop()
    depth = depths.pop()
  }
  return lines.join('\n')
}

export function formatCodeTable(table: CodeTable): string {
  const lines = ['Code table:']
  for (const code of table.codes) {
    lines.push(`'${escapeSymbol(code.symbol)}' -> ${formatCodeBits(code)}`)
  }
  return lines.join('\n')
}
