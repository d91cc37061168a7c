import { describe, it, expect } from 'vitest'
import { resolveSparkHome, requireSparkHome, ConfigurationError } from './resolve.js'

describe('resolveSparkHome', () => {
  it('prefers the explicit override', () => {
    expect(resolveSparkHome({
      override: '/cli/spark',
      env: { SPARK_HOME: '/env/spark' },
      config: { sparkHome: '/config/spark' }
    })).toBe('/cli/spark')
  })

  it('falls back to SPARK_HOME', () => {
    expect(resolveSparkHome({
      env: { SPARK_HOME: '/env/spark' },
      config: { sparkHome: '/config/spark' }
    })).toBe('/env/spark')
  })

  it('falls back to the config file', () => {
    expect(resolveSparkHome({
      env: {},
      config: { sparkHome: '/config/spark' }
    })).toBe('/config/spark')
  })

  it('skips blank values', () => {
    expect(resolveSparkHome({
      override: '',
      env: { SPARK_HOME: '  ' },
      config: { sparkHome: '/config/spark' }
    })).toBe('/config/spark')
  })

  it('returns undefined when nothing is set', () => {
    expect(resolveSparkHome({ env: {} })).toBeUndefined()
  })
})

describe('requireSparkHome', () => {
  it('returns the value when set', () => {
    expect(requireSparkHome('/opt/spark')).toBe('/opt/spark')
  })

  it('throws ConfigurationError when unset', () => {
    expect(() => requireSparkHome(undefined)).toThrow(ConfigurationError)
    expect(() => requireSparkHome(undefined)).toThrow('SPARK_HOME not set!')
  })
})
