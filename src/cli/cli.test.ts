import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Command } from 'commander'
import { createProgram } from './program.js'
import { formatCell, parseParams } from './params.js'
import { loadConfig } from '../config/index.js'

describe('CLI', () => {
  let tempDir: string
  let dbPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'lite-relay-cli-test-'))
    dbPath = join(tempDir, 'app.db')
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(tempDir, { recursive: true, force: true })
  })

  function program(): Command {
    return createProgram().exitOverride()
  }

  async function run(...args: string[]): Promise<void> {
    await program().parseAsync(['node', 'lite-relay', ...args])
  }

  function captureStdout() {
    const spy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
    return () => spy.mock.calls.map((call) => String(call[0]))
  }

  function captureStderr() {
    const spy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
    return () => spy.mock.calls.map((call) => String(call[0]))
  }

  describe('help output', () => {
    it('should list every command', () => {
      const help = program().helpInformation()
      expect(help).toContain('init')
      expect(help).toContain('exec')
      expect(help).toContain('script')
      expect(help).toContain('dump')
    })
  })

  describe('init command', () => {
    it('should write a config file that loads back', async () => {
      const configPath = join(tempDir, 'lite-relay.config.json')
      const stdout = captureStdout()

      await run('init', '--output', configPath)

      expect(existsSync(configPath)).toBe(true)
      const written: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      expect(written).toEqual({
        connection: {
          timeout: 5,
          echo: false,
          isolationLevel: '',
          checkSameThread: false,
          readonly: false,
          fileMustExist: false,
          safeIntegers: false,
        },
        pool: {},
        diagnostics: { level: 'info' },
      })
      expect(loadConfig(configPath).connection.timeout).toBe(5)
      expect(stdout()[0]).toBe(`Configuration written to ${configPath}\n`)
    })

    it('should refuse to overwrite an existing file', async () => {
      const configPath = join(tempDir, 'lite-relay.config.json')
      writeFileSync(configPath, '{}')
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderr = captureStderr()

      await run('init', '--output', configPath)

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr()[0]).toBe(`Warning: Configuration file already exists: ${configPath}\n`)
      expect(readFileSync(configPath, 'utf-8')).toBe('{}')
    })
  })

  describe('exec command', () => {
    it('should report changes for writes and print rows for reads', async () => {
      const stdout = captureStdout()

      await run('exec', dbPath, 'CREATE TABLE t(x INTEGER, name TEXT)')
      await run('exec', dbPath, 'INSERT INTO t VALUES (?, ?)', '--params', '[1, "a"]')
      await run('exec', dbPath, 'INSERT INTO t VALUES (:x, :name)', '-p', '{"x": 2, "name": null}')
      const before = stdout().length
      await run('exec', dbPath, 'SELECT x, name FROM t ORDER BY x')

      expect(stdout()[1]).toBe('1 row affected\n')
      expect(stdout().slice(before)).toEqual(['x  name\n', '-  ----\n', '1  a\n', '2  NULL\n', '(2 rows)\n'])
    })

    it('should reject malformed parameters before opening the database', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderr = captureStderr()

      await run('exec', dbPath, 'SELECT ?', '--params', '[')

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr()).toEqual(['Error: --params is not valid JSON: [\n'])
      expect(existsSync(dbPath)).toBe(false)
    })

    it('should print engine errors and exit with code 1', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      const stderr = captureStderr()

      await run('exec', dbPath, 'SELECT * FROM missing')

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr()).toEqual(['Error: no such table: missing\n'])
    })
  })

  describe('script command', () => {
    it('should run every statement in the file', async () => {
      const scriptPath = join(tempDir, 'schema.sql')
      writeFileSync(scriptPath, 'CREATE TABLE t(x);\nINSERT INTO t VALUES (1);\nINSERT INTO t VALUES (2);\n')
      const stdout = captureStdout()

      await run('script', dbPath, scriptPath)
      await run('exec', dbPath, 'SELECT count(*) AS n FROM t')

      expect(stdout()).toEqual([`OK: Script ${scriptPath} executed\n`, 'n\n', '-\n', '2\n', '(1 row)\n'])
    })

    it('should fail for a missing script file', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      captureStderr()

      await run('script', dbPath, join(tempDir, 'missing.sql'))

      expect(exitSpy).toHaveBeenCalledWith(1)
    })
  })

  describe('dump command', () => {
    it('should print the database as SQL', async () => {
      const stdout = captureStdout()
      await run('exec', dbPath, 'CREATE TABLE t(x)')
      await run('exec', dbPath, 'INSERT INTO t VALUES (?)', '-p', '["v"]')
      const before = stdout().length

      await run('dump', dbPath)

      expect(stdout().slice(before)).toEqual([
        'BEGIN TRANSACTION;\n',
        'CREATE TABLE t(x);\n',
        `INSERT INTO "t" VALUES('v');\n`,
        'COMMIT;\n',
      ])
    })

    it('should not create a database that does not exist', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)
      captureStderr()

      await run('dump', dbPath)

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(existsSync(dbPath)).toBe(false)
    })
  })
})

describe('parseParams', () => {
  it('should default to no parameters', () => {
    expect(parseParams(undefined)).toEqual([])
  })

  it('should accept positional and named parameters', () => {
    expect(parseParams('[1, "a", null]')).toEqual([1, 'a', null])
    expect(parseParams('{"id": 3}')).toEqual({ id: 3 })
  })

  it('should reject values SQLite cannot bind from JSON', () => {
    expect(() => parseParams('[true]')).toThrow(
      '--params must be a JSON array or object of numbers, strings and nulls',
    )
    expect(() => parseParams('"text"')).toThrow('--params must be a JSON array')
  })
})

describe('formatCell', () => {
  it('should render NULL and blobs readably', () => {
    expect(formatCell(null)).toBe('NULL')
    expect(formatCell(new Uint8Array(3))).toBe('<3 bytes>')
    expect(formatCell(10n)).toBe('10')
    expect(formatCell('text')).toBe('text')
  })
})
