// Encode
export { huffmanEncode } from './encode/encode'
export type { HuffmanEncodeOptions } from './encode/encode'
export { buildHistogram } from './encode/histogram'
export type { Histogram } from './encode/histogram'
export { buildHuffmanTree, codeTableFromTree } from './encode/tree-builder'
export { BitWriter } from './encode/bit-writer'

// Decode
export { huffmanDecode, huffmanDecodedSize } from './decode/decode'
export type { HuffmanDecodeOptions } from './decode/decode'
export { rebuildTree } from './decode/tree-rebuilder'
export { BitReader } from './decode/bit-reader'

// Shared
export { CodeTable, canonicalize, compareCanonical } from './code-table'
export type { Code, SymbolLength } from './code-table'
export { readContainerHeader, writeContainerHeader } from './container'
export type { ContainerHeader } from './container'
export { HuffmanTree, NO_NODE } from './tree'
export { HuffmanError, isHuffmanError } from './errors'
export type { HuffmanErrorCode } from './errors'
export { escapeSymbol, formatCodeTable, formatHistogram, formatTree } from './debug'
export type { DebugFlags } from './debug'
export { ALPHABET_SIZE, MAX_CODE_LENGTH } from './constants'
