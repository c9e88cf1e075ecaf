// Decode tree reconstruction from a canonical code table

import type { CodeTable } from '../code-table'
import { formatError } from '../errors'
import { HuffmanTree, NO_NODE } from '../tree'

// Each code creates at most `length` nodes below the shared root
export function rebuildCapacity(table: CodeTable): number {
  let capacity = 1
  for (const code of table.codes) {
    capacity += code.length
  }
  return capacity
}

export function rebuildTree(table: CodeTable): HuffmanTree {
  const tree = new HuffmanTree(rebuildCapacity(table))
  tree.root = tree.addEmpty()

  for (const { symbol, bits, length } of table.codes) {
    let node = tree.root
    for (let i = length - 1; i >= 0; i--) {
      if (tree.isLeaf(node)) {
        throw formatError(`Code for symbol ${symbol} extends the code of symbol ${tree.symbol[node]}`)
      }
      const bit = (bits >>> i) & 1
      let child = tree.child(node, bit)
      if (child === NO_NODE) {
        child = tree.addEmpty()
        tree.setChild(node, bit, child)
      }
      node = child
    }

    if (tree.isLeaf(node)) {
      throw formatError(`Symbols ${tree.symbol[node]} and ${symbol} share a code`)
    }
    if (tree.hasChildren(node)) {
      throw formatError(`Code for symbol ${symbol} is a prefix of another code`)
    }
    tree.symbol[node] = symbol
  }

  return tree
}
