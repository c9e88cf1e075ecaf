import { bench, describe } from 'vitest'
import * as zlib from 'node:zlib'
import { huffmanDecode } from '../src/decode/decode'
import { huffmanEncode } from '../src/encode/encode'

// Test data
const shortText = 'Hello, World!'
const mediumText = 'The quick brown fox jumps over the lazy dog. '.repeat(100)
const longText = mediumText.repeat(10)
const html = `<!DOCTYPE html><html><head><title>Test</title></head><body>${'<p>Content</p>'.repeat(500)}</body></html>`

const inputs = [
  { name: 'short (13 B)', data: new TextEncoder().encode(shortText) },
  { name: 'medium (4.5 KB)', data: new TextEncoder().encode(mediumText) },
  { name: 'long (45 KB)', data: new TextEncoder().encode(longText) },
  { name: 'html (7 KB)', data: new TextEncoder().encode(html) },
]

// Deflate restricted to Huffman coding is the closest native comparison
const huffmanOnly = { strategy: zlib.constants.Z_HUFFMAN_ONLY }

console.log('\nCompressed sizes:')
for (const { name, data } of inputs) {
  const ours = huffmanEncode(data)
  const native = zlib.deflateRawSync(data, huffmanOnly)
  console.log(`${name}: ours=${ours.length} deflate-huffman=${native.length} (${(ours.length / native.length).toFixed(2)}x)`)
}
console.log('')

describe('encode', () => {
  for (const { name, data } of inputs) {
    bench(`huffman-lib ${name}`, () => {
      huffmanEncode(data)
    })

    bench(`node:zlib ${name}`, () => {
      zlib.deflateRawSync(data, huffmanOnly)
    })
  }
})

describe('decode', () => {
  for (const { name, data } of inputs) {
    const ours = huffmanEncode(data)
    const native = zlib.deflateRawSync(data, huffmanOnly)

    bench(`huffman-lib ${name}`, () => {
      huffmanDecode(ours)
    })

    bench(`node:zlib ${name}`, () => {
      zlib.inflateRawSync(native)
    })
  }
})
