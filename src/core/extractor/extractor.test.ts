import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, readdir, rm, stat } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { JarArchive } from '../archive/index.js'
import { createMemorySink } from '../../utils/sink.js'
import { createJarBytes, rPackageEntries, R_MANIFEST } from '../__fixtures__/jars.js'
import { extractRFolder, isREntry, ExtractionError, SCRATCH_PREFIX } from './extractor.js'

function jarOf(entries: Record<string, string | Uint8Array>): JarArchive {
  return JarArchive.fromBytes('test.jar', createJarBytes(entries))
}

describe('extractRFolder', () => {
  let workDir: string

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'rpkg-extract-test-'))
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  it('copies R/pkg entries with identical content', async () => {
    const sink = createMemorySink()

    const dir = await extractRFolder(jarOf(rPackageEntries()), sink, false, { workDir })

    expect(await readFile(join(dir, 'R/pkg/DESCRIPTION'), 'utf-8')).toBe('Package: demo')
    expect(await readFile(join(dir, 'R/pkg/R/code.R'), 'utf-8')).toBe('hello <- function() "hi"\n')
    expect(sink.lines).toEqual([])
  })

  it('creates the scratch directory under the work dir', async () => {
    const dir = await extractRFolder(jarOf(rPackageEntries()), createMemorySink(), false, { workDir })

    expect(dir.startsWith(join(workDir, SCRATCH_PREFIX))).toBe(true)
    expect(await readdir(workDir)).toHaveLength(1)
  })

  it('uses a fresh directory for every call', async () => {
    const jar = jarOf(rPackageEntries())

    const first = await extractRFolder(jar, createMemorySink(), false, { workDir })
    const second = await extractRFolder(jar, createMemorySink(), false, { workDir })

    expect(first).not.toBe(second)
  })

  it('skips entries outside R/pkg', async () => {
    const dir = await extractRFolder(jarOf(rPackageEntries()), createMemorySink(), false, { workDir })

    expect((await readdir(dir)).sort()).toEqual(['R'])
    expect((await readdir(join(dir, 'R'))).sort()).toEqual(['pkg'])
  })

  it('keeps the path from the marker onwards', async () => {
    const dir = await extractRFolder(jarOf({
      'META-INF/MANIFEST.MF': R_MANIFEST,
      'bundle/R/pkg/NAMESPACE': 'export(hello)'
    }), createMemorySink(), false, { workDir })

    expect(await readFile(join(dir, 'R/pkg/NAMESPACE'), 'utf-8')).toBe('export(hello)')
  })

  it('creates directory entries even when empty', async () => {
    const dir = await extractRFolder(jarOf({
      'R/pkg/': '',
      'R/pkg/inst/': ''
    }), createMemorySink(), false, { workDir })

    expect((await stat(join(dir, 'R/pkg/inst'))).isDirectory()).toBe(true)
  })

  it('preserves binary content', async () => {
    const bytes = new Uint8Array([0, 255, 10, 13, 128, 1])

    const dir = await extractRFolder(jarOf({
      'R/pkg/data/blob.rda': bytes
    }), createMemorySink(), false, { workDir })

    expect(new Uint8Array(await readFile(join(dir, 'R/pkg/data/blob.rda')))).toEqual(bytes)
  })

  it('reports every directory and file when verbose', async () => {
    const sink = createMemorySink()

    const dir = await extractRFolder(jarOf({
      'R/pkg/': '',
      'R/pkg/DESCRIPTION': 'Package: demo'
    }), sink, true, { workDir })

    expect(sink.lines).toEqual([
      `Creating directory: ${join(dir, 'R/pkg')}`,
      `Extracting R/pkg/DESCRIPTION to ${join(dir, 'R/pkg/DESCRIPTION')}`
    ])
  })

  it('rejects entries that climb out of the scratch directory and removes it', async () => {
    const jar = jarOf({
      'R/pkg/DESCRIPTION': 'Package: demo',
      'R/pkg/../../../evil.txt': 'nope'
    })

    await expect(extractRFolder(jar, createMemorySink(), false, { workDir }))
      .rejects.toThrow(ExtractionError)
    expect(await readdir(workDir)).toEqual([])
  })
})

describe('isREntry', () => {
  it('matches names containing R/pkg', () => {
    expect(isREntry('R/pkg/DESCRIPTION')).toBe(true)
    expect(isREntry('nested/R/pkg/')).toBe(true)
  })

  it('does not match other names', () => {
    expect(isREntry('R/')).toBe(false)
    expect(isREntry('r/pkg/DESCRIPTION')).toBe(false)
    expect(isREntry('META-INF/MANIFEST.MF')).toBe(false)
  })
})
