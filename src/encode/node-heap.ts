// Fixed-capacity binary min-heap of tree nodes
//
// Ordered by weight. Equal weights fall back to the node index, which is the
// node's creation order in the arena, so the tree shape is deterministic.

import { HuffmanError } from '../errors'
import type { HuffmanTree } from '../tree'

export class NodeHeap {
  private readonly tree: HuffmanTree
  private readonly data: Int32Array
  length: number

  constructor(tree: HuffmanTree, capacity: number) {
    this.tree = tree
    this.data = new Int32Array(capacity)
    this.length = 0
  }

  get capacity(): number {
    return this.data.length
  }

  insert(node: number): void {
    if (this.length >= this.data.length) {
      throw new HuffmanError('CAPACITY', `Heap capacity ${this.data.length} exceeded`)
    }
    this.data[this.length] = node
    this.siftUp(this.length++)
  }

  extractMin(): number {
    if (this.length === 0) {
      throw new HuffmanError('CAPACITY', 'extractMin on an empty heap')
    }
    const min = this.data[0]
    this.length--
    if (this.length > 0) {
      this.data[0] = this.data[this.length]
      this.siftDown(0)
    }
    return min
  }

  private less(a: number, b: number): boolean {
    const wa = this.tree.weight[a]
    const wb = this.tree.weight[b]
    if (wa !== wb) return wa < wb
    return a < b
  }

  private siftUp(index: number): void {
    const data = this.data
    while (index > 0) {
      const parent = (index - 1) >> 1
      if (!this.less(data[index], data[parent])) break
      this.swap(index, parent)
      index = parent
    }
  }

  private siftDown(index: number): void {
    const data = this.data
    for (;;) {
      const left = 2 * index + 1
      const right = left + 1
      let smallest = index
      if (left < this.length && this.less(data[left], data[smallest])) smallest = left
      if (right < this.length && this.less(data[right], data[smallest])) smallest = right
      if (smallest === index) return
      this.swap(index, smallest)
      index = smallest
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.data[i]
    this.data[i] = this.data[j]
    this.data[j] = tmp
  }
}
