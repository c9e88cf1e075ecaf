import { describe, it, expect } from 'vitest'
import { parseCommand, runCli, usage } from '../src/cli'
import type { CliIO } from '../src/cli'
import { huffmanEncode } from '../src/encode/encode'
import { isHuffmanError } from '../src/errors'
import { ascii } from './helpers'

function memoryIO(files: Record<string, Uint8Array> = {}, stdin: Uint8Array = new Uint8Array(0)) {
  const store = new Map(Object.entries(files))
  const stdout: Array<Uint8Array | string> = []
  const stderr: string[] = []
  const errors: unknown[] = []

  const io: CliIO = {
    readFile(path) {
      const data = store.get(path)
      if (data === undefined) {
        const err = new Error(`ENOENT: no such file, open '${path}'`)
        errors.push(err)
        throw err
      }
      return data
    },
    writeFile(path, data) {
      store.set(path, data)
    },
    readStdin: () => stdin,
    writeStdout(data) {
      stdout.push(data)
    },
    writeStderr(text) {
      stderr.push(text)
    },
  }
  return { io, store, stdout, stderr, errors }
}

function usageFailure(argv: string[]): unknown {
  try {
    parseCommand(argv)
  } catch (err) {
    return err
  }
  return undefined
}

describe('parseCommand', () => {
  it('defaults to compressing standard input', () => {
    expect(parseCommand([])).toEqual({
      mode: 'compress',
      debug: {},
      input: undefined,
      output: undefined,
      help: false,
    })
  })

  it('collects debug stages and positionals', () => {
    expect(parseCommand(['-d', '--debug', 'tree', 'in.huf', 'out.txt'])).toEqual({
      mode: 'decompress',
      debug: { tree: true },
      input: 'in.huf',
      output: 'out.txt',
      help: false,
    })
  })

  it('skips suffix rules when asking for help', () => {
    expect(parseCommand(['-h', 'a.huf']).help).toBe(true)
  })

  it('raises usage errors as INPUT', () => {
    const cases: Array<[string[], string]> = [
      [['-c', '-d'], '--compress and --decompress are mutually exclusive'],
      [['a', 'b', 'c'], "Unexpected argument 'c'"],
      [['--debug', 'heap'], "Unknown debug stage 'heap', expected one of freq, tree, code"],
      [['a.huf'], "input file 'a.huf' already has the .huf suffix"],
      [['-d', 'a.txt'], "input file 'a.txt' lacks the .huf suffix"],
    ]
    for (const [argv, message] of cases) {
      const err = usageFailure(argv)
      expect(isHuffmanError(err, 'INPUT')).toBe(true)
      expect(err).toHaveProperty('message', message)
    }
  })

  it('wraps unknown options as INPUT with the parser error as cause', () => {
    const err = usageFailure(['--level'])
    expect(isHuffmanError(err, 'INPUT')).toBe(true)
    expect(err).toHaveProperty('message', expect.stringContaining("'--level'"))
    expect(err).toHaveProperty('cause', expect.any(TypeError))
  })
})

describe('runCli', () => {
  it('compresses a file to a file', () => {
    const { io, store, stderr } = memoryIO({ 'notes.txt': ascii('hello') })
    expect(runCli(['notes.txt', 'notes.txt.huf'], io)).toBe(0)
    expect(store.get('notes.txt.huf')).toEqual(huffmanEncode(ascii('hello')))
    expect(stderr).toEqual([])
  })

  it('decompresses a file to a file', () => {
    const { io, store } = memoryIO({ 'notes.txt.huf': huffmanEncode(ascii('mississippi')) })
    expect(runCli(['-d', 'notes.txt.huf', 'notes.txt'], io)).toBe(0)
    expect(store.get('notes.txt')).toEqual(ascii('mississippi'))
  })

  it('defaults to standard input and output', () => {
    const { io, stdout } = memoryIO({}, ascii('hello'))
    expect(runCli([], io)).toBe(0)
    expect(stdout).toEqual([huffmanEncode(ascii('hello'))])

    const back = memoryIO({}, huffmanEncode(ascii('hello')))
    expect(runCli(['--decompress'], back.io)).toBe(0)
    expect(back.stdout).toEqual([ascii('hello')])
  })

  it('writes to standard output when only the input is given', () => {
    const { io, stdout } = memoryIO({ 'a.txt': ascii('ab') })
    expect(runCli(['a.txt'], io)).toBe(0)
    expect(stdout).toEqual([huffmanEncode(ascii('ab'))])
  })

  it('refuses to compress an already compressed name', () => {
    const { io, stderr } = memoryIO({ 'a.huf': ascii('x') })
    expect(runCli(['a.huf'], io)).toBe(1)
    expect(stderr).toEqual(["error: input file 'a.huf' already has the .huf suffix\n"])
  })

  it('refuses to decompress a name without the suffix', () => {
    const { io, stderr } = memoryIO({ 'a.txt': ascii('x') })
    expect(runCli(['-d', 'a.txt'], io)).toBe(1)
    expect(stderr).toEqual(["error: input file 'a.txt' lacks the .huf suffix\n"])
  })

  it('reports read failures', () => {
    const { io, stderr, errors } = memoryIO()
    expect(runCli(['missing.txt'], io)).toBe(1)
    expect(stderr).toEqual(["error: input file 'missing.txt' read failed\n"])
    expect(errors.length).toBe(1)
  })

  it('reports write failures', () => {
    const { io, stderr } = memoryIO({ 'a.txt': ascii('ab') })
    io.writeFile = () => {
      throw new Error('EACCES')
    }
    expect(runCli(['a.txt', 'out.huf'], io)).toBe(1)
    expect(stderr).toEqual(["error: output file 'out.huf' write failed\n"])
  })

  it('prints requested debug dumps to stderr', () => {
    const { io, stderr, store } = memoryIO({ 'notes.txt': ascii('hello') })
    expect(runCli(['--debug', 'freq', '--debug', 'code', 'notes.txt', 'notes.huf'], io)).toBe(0)
    expect(stderr).toEqual([
      "Freq table:\n'e' -> 1\n'h' -> 1\n'l' -> 2\n'o' -> 1\n",
      "Code table:\n'e' -> 00\n'h' -> 01\n'l' -> 10\n'o' -> 11\n",
    ])
    expect(store.get('notes.huf')).toEqual(huffmanEncode(ascii('hello')))
  })

  it('rejects unknown debug stages', () => {
    const { io, stderr } = memoryIO({ 'a.txt': ascii('a') })
    expect(runCli(['--debug', 'heap', 'a.txt'], io)).toBe(1)
    expect(stderr).toEqual(["error: Unknown debug stage 'heap', expected one of freq, tree, code\n"])
  })

  it('rejects conflicting modes and extra arguments', () => {
    const conflict = memoryIO()
    expect(runCli(['-c', '-d'], conflict.io)).toBe(1)
    expect(conflict.stderr).toEqual(['error: --compress and --decompress are mutually exclusive\n'])

    const extra = memoryIO()
    expect(runCli(['a', 'b', 'c'], extra.io)).toBe(1)
    expect(extra.stderr).toEqual(["error: Unexpected argument 'c'\n"])
  })

  it('reports unknown options', () => {
    const { io, stderr } = memoryIO()
    expect(runCli(['--level'], io)).toBe(1)
    expect(stderr.length).toBe(1)
    expect(stderr[0]).toMatch(/^error: Unknown option '--level'/)
  })

  it('prints usage', () => {
    const { io, stdout } = memoryIO()
    expect(runCli(['--help'], io, 'huff')).toBe(0)
    expect(stdout).toEqual([usage('huff')])
    expect(usage('huff').split('\n')[0]).toBe('Usage: huff [options] [input] [output]')
  })

  it('reports corrupt containers', () => {
    const { io, stderr, stdout } = memoryIO({}, new Uint8Array([0, 0, 0]))
    expect(runCli(['-d'], io)).toBe(1)
    expect(stderr).toEqual(['error: Truncated header: expected at least 5 bytes, got 3\n'])
    expect(stdout).toEqual([])
  })

  it('reports input outside the alphabet', () => {
    const { io, stderr } = memoryIO({ 'latin1.txt': new Uint8Array([0x63, 0x61, 0x66, 0xE9]) })
    expect(runCli(['latin1.txt'], io)).toBe(1)
    expect(stderr).toEqual(['error: Byte 0xe9 at offset 3 is outside the 128-symbol alphabet\n'])
  })
})
