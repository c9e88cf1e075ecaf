// Errors raised by the encoder, decoder and CLI

export type HuffmanErrorCode =
  | 'INPUT'     // byte outside the alphabet, input too long, bad CLI usage
  | 'FORMAT'    // malformed container
  | 'CAPACITY'  // heap or tree arena overrun
  | 'IO'        // stream read/write failed
  | 'LIMIT'     // decoded size above the caller's limit

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode

  constructor(code: HuffmanErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'HuffmanError'
    this.code = code
  }
}

export function formatError(message: string): HuffmanError {
  return new HuffmanError('FORMAT', message)
}

export function isHuffmanError(err: unknown, code?: HuffmanErrorCode): err is HuffmanError {
  return err instanceof HuffmanError && (code === undefined || err.code === code)
}
