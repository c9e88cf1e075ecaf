// Bit reading for Huffman decompression

import { formatError } from '../errors'

// Reads bits MSB-first from a byte array; inverse of BitWriter.
// The reader cannot tell padding from data, so callers stop on a known count.
export class BitReader {
  readonly buffer: Uint8Array
  pos: number // bit position

  constructor(buffer: Uint8Array) {
    this.buffer = buffer
    this.pos = 0
  }

  get bitLength(): number {
    return this.buffer.length * 8
  }

  get bitsRemaining(): number {
    return this.bitLength - this.pos
  }

  // Bytes touched so far, counting a partially read byte
  get bytePos(): number {
    return (this.pos + 7) >>> 3
  }

  readBit(): number {
    if (this.pos >= this.bitLength) {
      throw formatError('Unexpected end of input')
    }
    const bit = (this.buffer[this.pos >>> 3] >>> (7 - (this.pos & 7))) & 1
    this.pos++
    return bit
  }

  // Up to 31 bits
  readBits(nBits: number): number {
    if (nBits > this.bitsRemaining) {
      throw formatError('Unexpected end of input')
    }
    let value = 0
    for (let i = 0; i < nBits; i++) {
      value = (value << 1) | this.readBit()
    }
    return value >>> 0
  }

  readByte(): number {
    this.assertAligned()
    return this.readBits(8)
  }

  // Big-endian
  readUint32(): number {
    const b0 = this.readByte()
    const b1 = this.readByte()
    const b2 = this.readByte()
    const b3 = this.readByte()
    return ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0
  }

  private assertAligned(): void {
    if ((this.pos & 7) !== 0) {
      throw new Error('Invalid alignment for byte read')
    }
  }
}
