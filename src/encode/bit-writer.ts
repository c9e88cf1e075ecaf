// Bit writing for Huffman container bodies

import { HuffmanError } from '../errors'

// Writes bits to a byte array in MSB-first order within each byte.
// Inverse of BitReader.
//
// Bits written to increasing byte addresses; within a byte, MSB first.
// Example: 3 bits 'RRR' written -> BYTE-0: RRR0 0000
// Writing 7 more 'SSSSSSS' -> BYTE-0: RRRS SSSS, BYTE-1: SS00 0000
// Unwritten low bits of the final byte stay zero.
export class BitWriter {
  buffer: Uint8Array
  pos: number // bit position

  constructor(initialSize: number = 4096) {
    this.buffer = new Uint8Array(Math.max(1, initialSize))
    this.pos = 0
  }

  private ensureCapacity(bits: number): void {
    const bytesNeeded = (this.pos + bits + 7) >>> 3
    if (bytesNeeded > this.buffer.length) {
      const newSize = Math.max(this.buffer.length * 2, bytesNeeded)
      const newBuffer = new Uint8Array(newSize)
      newBuffer.set(this.buffer)
      this.buffer = newBuffer
    }
  }

  // Write the low nBits of value, up to 31
  writeBits(nBits: number, value: number): void {
    if (nBits < 0 || nBits > 31) {
      throw new HuffmanError('CAPACITY', `Cannot write ${nBits} bits at once`)
    }
    this.ensureCapacity(nBits)

    let remaining = nBits
    while (remaining > 0) {
      const bitOffset = this.pos & 7
      const free = 8 - bitOffset
      const take = Math.min(free, remaining)
      const chunk = (value >>> (remaining - take)) & ((1 << take) - 1)
      this.buffer[this.pos >>> 3] |= chunk << (free - take)
      this.pos += take
      remaining -= take
    }
  }

  // Throws if not byte-aligned
  writeByte(byte: number): void {
    this.assertAligned()
    this.writeBits(8, byte & 0xFF)
  }

  // Big-endian; must be byte-aligned
  writeUint32(value: number): void {
    this.writeByte(value >>> 24)
    this.writeByte(value >>> 16)
    this.writeByte(value >>> 8)
    this.writeByte(value)
  }

  finish(): Uint8Array {
    // Round up to include partial final byte
    const byteLength = (this.pos + 7) >>> 3
    return this.buffer.slice(0, byteLength)
  }

  private assertAligned(): void {
    if ((this.pos & 7) !== 0) {
      throw new Error('BitWriter not byte-aligned')
    }
  }
}
