export function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

// Bytes drawn from the 7-bit alphabet
export function randomSymbols(len: number, nextU32: () => number, alphabet: number = 128): Uint8Array {
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = nextU32() % alphabet
  return out
}

export function ascii(text: string): Uint8Array {
  return new TextEncoder().encode(text)
}

// F(1)..F(n); n Fibonacci weights force a tree n - 1 levels deep
export function fibonacciWeights(n: number): number[] {
  const weights = [1, 1]
  while (weights.length < n) weights.push(weights[weights.length - 1] + weights[weights.length - 2])
  return weights.slice(0, n)
}

export function fibonacciInput(n: number): Uint8Array {
  const weights = fibonacciWeights(n)
  const out = new Uint8Array(weights.reduce((sum, w) => sum + w, 0))
  let pos = 0
  weights.forEach((weight, symbol) => {
    out.fill(symbol, pos, pos + weight)
    pos += weight
  })
  return out
}
