// Huffman tree construction and tree-derived codes

import { ALPHABET_SIZE, MAX_CODE_LENGTH } from '../constants'
import { CodeTable } from '../code-table'
import type { Code } from '../code-table'
import { HuffmanError } from '../errors'
import { HuffmanTree } from '../tree'
import type { Histogram } from './histogram'
import { NodeHeap } from './node-heap'

// n distinct symbols need exactly 2n - 1 nodes
export function treeCapacity(distinct: number): number {
  return 2 * distinct - 1
}

export function buildHuffmanTree(
  histogram: Histogram,
  treeLimit: number = MAX_CODE_LENGTH
): HuffmanTree {
  if (histogram.distinct === 0) {
    throw new HuffmanError('INPUT', 'Cannot build a Huffman tree from an empty histogram')
  }

  // Retry with increasing count_limit until tree fits in treeLimit bits.
  // Raising small counts flattens the tree; once every count equals the
  // limit the tree is balanced, so this terminates.
  for (let countLimit = 1; ; countLimit *= 2) {
    const tree = buildTreeWithCountLimit(histogram, countLimit)
    if (treeDepth(tree) <= treeLimit) {
      return tree
    }
  }
}

function buildTreeWithCountLimit(histogram: Histogram, countLimit: number): HuffmanTree {
  const capacity = treeCapacity(histogram.distinct)
  const tree = new HuffmanTree(capacity)
  const heap = new NodeHeap(tree, capacity)

  // Leaves in ascending symbol order; this fixes the tie-break
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = histogram.data[symbol]
    if (count > 0) {
      heap.insert(tree.addLeaf(symbol, Math.max(count, countLimit)))
    }
  }

  while (heap.length > 1) {
    const left = heap.extractMin()
    const right = heap.extractMin()
    heap.insert(tree.addInternal(left, right))
  }
  tree.root = heap.extractMin()

  return tree
}

// Deepest leaf, walked with an explicit stack
export function treeDepth(tree: HuffmanTree): number {
  const stackNode = new Int32Array(tree.size)
  const stackDepth = new Uint8Array(tree.size)
  let top = 0
  stackNode[top] = tree.root
  stackDepth[top] = 0
  top++

  let maxDepth = 0
  while (top > 0) {
    top--
    const node = stackNode[top]
    const depth = stackDepth[top]
    if (tree.isLeaf(node)) {
      maxDepth = Math.max(maxDepth, depth)
      continue
    }
    stackNode[top] = tree.right[node]
    stackDepth[top] = depth + 1
    top++
    stackNode[top] = tree.left[node]
    stackDepth[top] = depth + 1
    top++
  }
  return maxDepth
}

// Walks the tree (0 = left, 1 = right) with an explicit stack.
// A lone leaf still gets a 1-bit code: zero-length codes cannot be packed.
export function codeTableFromTree(tree: HuffmanTree): CodeTable {
  const codes: Code[] = []
  if (tree.isLeaf(tree.root)) {
    codes.push({ symbol: tree.symbol[tree.root], bits: 0, length: 1 })
    return new CodeTable(codes)
  }

  const stackNode = new Int32Array(tree.size)
  const stackBits = new Uint32Array(tree.size)
  const stackLength = new Uint8Array(tree.size)
  let top = 0
  stackNode[top] = tree.root
  stackBits[top] = 0
  stackLength[top] = 0
  top++

  while (top > 0) {
    top--
    const node = stackNode[top]
    const bits = stackBits[top]
    const length = stackLength[top]

    if (tree.isLeaf(node)) {
      codes.push({ symbol: tree.symbol[node], bits, length })
      continue
    }

    // Right first so the left subtree is listed first
    stackNode[top] = tree.right[node]
    stackBits[top] = ((bits << 1) | 1) >>> 0
    stackLength[top] = length + 1
    top++
    stackNode[top] = tree.left[node]
    stackBits[top] = (bits << 1) >>> 0
    stackLength[top] = length + 1
    top++
  }

  return new CodeTable(codes)
}
