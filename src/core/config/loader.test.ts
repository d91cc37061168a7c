import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { dirname, join } from 'path'
import { tmpdir } from 'os'
import { fileURLToPath } from 'url'
import { ConfigLoader, ConfigLoadError, DEFAULT_CONFIG_FILENAME } from './loader.js'
import { DEFAULT_INSTALL_COMMAND } from './schema.js'

const fixturesPath = join(dirname(fileURLToPath(import.meta.url)), '__fixtures__')

describe('ConfigLoader', () => {
  let loader: ConfigLoader

  beforeEach(() => {
    loader = new ConfigLoader({ basePath: fixturesPath })
  })

  describe('load', () => {
    it('loads a valid config file', async () => {
      const config = await loader.load('valid-config.yaml')

      expect(config).toEqual({
        sparkHome: '/opt/spark',
        installCommand: ['R', 'CMD', 'INSTALL', '--no-test-load', '-l'],
        workDir: '/var/tmp/rpkg',
        inheritEnv: true
      })
    })

    it('throws ConfigLoadError for a non-existent file', async () => {
      await expect(loader.load('non-existent.yaml')).rejects.toThrow(ConfigLoadError)
    })

    it('collects every validation error', async () => {
      try {
        await loader.load('invalid-config.yaml')
        expect.fail('Should have thrown')
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigLoadError)
        const configError = error as ConfigLoadError
        expect(configError.validationErrors).toEqual([
          'sparkHome: sparkHome must not be empty',
          'installCommand: installCommand needs at least the executable',
          'inheritEnv: Expected boolean, received string'
        ])
        expect(configError.configPath).toBe(join(fixturesPath, 'invalid-config.yaml'))
      }
    })

    it('rejects unknown keys', async () => {
      await expect(loader.load('unknown-key.yaml')).rejects.toThrow(/Unrecognized key/)
    })

    it('reports malformed YAML', async () => {
      await expect(loader.load('broken.yaml')).rejects.toThrow('Invalid YAML in config file: broken.yaml')
    })
  })

  describe('loadOrDefault', () => {
    let tempDir: string

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'rpkg-config-test-'))
    })

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true })
    })

    it('returns defaults when no config file exists', async () => {
      const config = await new ConfigLoader({ basePath: tempDir }).loadOrDefault()

      expect(config).toEqual({
        installCommand: [...DEFAULT_INSTALL_COMMAND],
        inheritEnv: false
      })
    })

    it('picks up the default file from the base path', async () => {
      await writeFile(join(tempDir, DEFAULT_CONFIG_FILENAME), 'sparkHome: /srv/spark\n')

      const config = await new ConfigLoader({ basePath: tempDir }).loadOrDefault()

      expect(config.sparkHome).toBe('/srv/spark')
    })

    it('prefers an explicit path', async () => {
      await writeFile(join(tempDir, DEFAULT_CONFIG_FILENAME), 'sparkHome: /srv/spark\n')

      const config = await new ConfigLoader({ basePath: tempDir })
        .loadOrDefault(join(fixturesPath, 'valid-config.yaml'))

      expect(config.sparkHome).toBe('/opt/spark')
    })
  })

  describe('loadFromString', () => {
    it('treats an empty document as all defaults', () => {
      expect(loader.loadFromString('')).toEqual({
        installCommand: ['R', 'CMD', 'INSTALL', '-l'],
        inheritEnv: false
      })
    })
  })
})
