// Command-line front end

import { readFileSync, writeFileSync } from 'node:fs'
import { parseArgs } from 'node:util'
import { huffmanDecode } from './decode/decode'
import type { DebugFlags } from './debug'
import { huffmanEncode } from './encode/encode'
import { HuffmanError } from './errors'

export const CONTAINER_SUFFIX = '.huf'

export interface CliIO {
  readFile(path: string): Uint8Array
  writeFile(path: string, data: Uint8Array): void
  readStdin(): Uint8Array
  writeStdout(data: Uint8Array | string): void
  writeStderr(text: string): void
}

export const nodeIO: CliIO = {
  readFile: (path) => readFileSync(path),
  writeFile: (path, data) => writeFileSync(path, data),
  readStdin: () => readFileSync(0),
  writeStdout: (data) => {
    process.stdout.write(data)
  },
  writeStderr: (text) => {
    process.stderr.write(text)
  },
}

const DEBUG_STAGES = ['freq', 'tree', 'code'] as const
type DebugStage = (typeof DEBUG_STAGES)[number]

function isDebugStage(value: string): value is DebugStage {
  return (DEBUG_STAGES as readonly string[]).includes(value)
}

export function usage(programName: string): string {
  return [
    `Usage: ${programName} [options] [input] [output]`,
    'Compress or decompress a file using canonical Huffman coding.',
    '',
    'Arguments:',
    '  input       Input file (stdin if omitted)',
    '  output      Output file (stdout if omitted)',
    '',
    'Options:',
    '  -c, --compress        Compress input (default)',
    `  -d, --decompress      Decompress a ${CONTAINER_SUFFIX} input`,
    '  --debug <stage>       Print freq, tree or code to stderr (compress only)',
    '  -h, --help            Display this help message',
    '',
  ].join('\n')
}

export interface CliCommand {
  mode: 'compress' | 'decompress'
  debug: DebugFlags
  input?: string
  output?: string
  help: boolean
}

function usageError(message: string, cause?: unknown): HuffmanError {
  return new HuffmanError('INPUT', message, cause === undefined ? undefined : { cause })
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        compress: { type: 'boolean', short: 'c' },
        decompress: { type: 'boolean', short: 'd' },
        debug: { type: 'string', multiple: true },
        help: { type: 'boolean', short: 'h' },
      },
    })
  } catch (err) {
    throw usageError(err instanceof Error ? err.message : String(err), err)
  }
}

export function parseCommand(argv: string[]): CliCommand {
  const { values, positionals } = parseFlags(argv)

  if (values.compress && values.decompress) {
    throw usageError('--compress and --decompress are mutually exclusive')
  }
  if (positionals.length > 2) {
    throw usageError(`Unexpected argument '${positionals[2]}'`)
  }

  const debug: DebugFlags = {}
  for (const stage of values.debug ?? []) {
    if (!isDebugStage(stage)) {
      throw usageError(`Unknown debug stage '${stage}', expected one of ${DEBUG_STAGES.join(', ')}`)
    }
    debug[stage] = true
  }

  const mode = values.decompress ? 'decompress' : 'compress'
  const help = values.help ?? false
  const input = positionals[0]
  if (!help && input !== undefined) {
    if (mode === 'compress' && input.endsWith(CONTAINER_SUFFIX)) {
      throw usageError(`input file '${input}' already has the ${CONTAINER_SUFFIX} suffix`)
    }
    if (mode === 'decompress' && !input.endsWith(CONTAINER_SUFFIX)) {
      throw usageError(`input file '${input}' lacks the ${CONTAINER_SUFFIX} suffix`)
    }
  }

  return { mode, debug, input, output: positionals[1], help }
}

function readInput(io: CliIO, path: string | undefined): Uint8Array {
  try {
    return path === undefined ? io.readStdin() : io.readFile(path)
  } catch (err) {
    const source = path === undefined ? 'standard input' : `input file '${path}'`
    throw new HuffmanError('IO', `${source} read failed`, { cause: err })
  }
}

function writeOutput(io: CliIO, path: string | undefined, data: Uint8Array): void {
  try {
    if (path === undefined) {
      io.writeStdout(data)
    } else {
      io.writeFile(path, data)
    }
  } catch (err) {
    const target = path === undefined ? 'standard output' : `output file '${path}'`
    throw new HuffmanError('IO', `${target} write failed`, { cause: err })
  }
}

// Returns the process exit status
export function runCli(argv: string[], io: CliIO = nodeIO, programName = 'huffman-lib'): number {
  try {
    const command = parseCommand(argv)
    if (command.help) {
      io.writeStdout(usage(programName))
      return 0
    }

    const { input, output } = command
    const data = readInput(io, input)
    const result = command.mode === 'compress'
      ? huffmanEncode(data, { debug: command.debug, log: (message) => io.writeStderr(`${message}\n`) })
      : huffmanDecode(data)
    writeOutput(io, output, result)
    return 0
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    io.writeStderr(`error: ${message}\n`)
    return 1
  }
}
