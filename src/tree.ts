// Huffman tree storage shared by the encoder and decoder
//
// Struct-of-arrays arena: nodes are indices into parallel typed arrays, so the
// whole tree is released at once and never walked recursively.

import { HuffmanError } from './errors'

export const NO_NODE = -1

export class HuffmanTree {
  readonly capacity: number
  readonly weight: Float64Array
  readonly left: Int32Array
  readonly right: Int32Array
  readonly symbol: Int16Array  // NO_NODE for internal nodes
  size: number
  root: number

  constructor(capacity: number) {
    this.capacity = capacity
    this.weight = new Float64Array(capacity)
    this.left = new Int32Array(capacity).fill(NO_NODE)
    this.right = new Int32Array(capacity).fill(NO_NODE)
    this.symbol = new Int16Array(capacity).fill(NO_NODE)
    this.size = 0
    this.root = NO_NODE
  }

  private allocate(): number {
    if (this.size >= this.capacity) {
      throw new HuffmanError('CAPACITY', `Tree capacity ${this.capacity} exceeded`)
    }
    return this.size++
  }

  addLeaf(symbol: number, weight: number): number {
    const node = this.allocate()
    this.symbol[node] = symbol
    this.weight[node] = weight
    return node
  }

  addInternal(left: number, right: number): number {
    const node = this.allocate()
    this.left[node] = left
    this.right[node] = right
    this.weight[node] = this.weight[left] + this.weight[right]
    return node
  }

  // Childless, symbol-less node; filled in by the decoder's rebuild
  addEmpty(): number {
    return this.allocate()
  }

  isLeaf(node: number): boolean {
    return this.symbol[node] !== NO_NODE
  }

  hasChildren(node: number): boolean {
    return this.left[node] !== NO_NODE || this.right[node] !== NO_NODE
  }

  child(node: number, bit: number): number {
    return bit === 0 ? this.left[node] : this.right[node]
  }

  setChild(node: number, bit: number, child: number): void {
    if (bit === 0) {
      this.left[node] = child
    } else {
      this.right[node] = child
    }
  }
}
