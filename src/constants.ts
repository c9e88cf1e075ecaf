// Format constants for the Huffman container

// Symbols are byte values 0..127; the upper half of the byte range is unused
export const ALPHABET_SIZE = 128

// Codes are handled as unsigned 32-bit numbers
export const MAX_CODE_LENGTH = 31

// original_length is a u32
export const MAX_ORIGINAL_LENGTH = 0xFFFFFFFF

// original_length (4) + symbol_count (1)
export const FIXED_HEADER_SIZE = 5

// symbol (1) + code_length (1)
export const HEADER_ENTRY_SIZE = 2

export function containerHeaderSize(symbolCount: number): number {
  return FIXED_HEADER_SIZE + symbolCount * HEADER_ENTRY_SIZE
}
