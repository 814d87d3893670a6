import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createConsoleLogger, resolveLogLevel, silentLogger } from '../../src/logger.js'

beforeEach(() => {
  vi.spyOn(console, 'debug').mockImplementation(() => {})
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createConsoleLogger', () => {
  it('prefixes every line with [dpm]', () => {
    const logger = createConsoleLogger('debug')
    logger.debug('dispatcher: a')
    logger.info('cycle: b')
    logger.warn('cycle: c')
    logger.error('cycle: d', { detail: 1 })

    expect(console.debug).toHaveBeenCalledWith('[dpm] dispatcher: a')
    expect(console.log).toHaveBeenCalledWith('[dpm] cycle: b')
    expect(console.warn).toHaveBeenCalledWith('[dpm] cycle: c')
    expect(console.error).toHaveBeenCalledWith('[dpm] cycle: d', { detail: 1 })
  })

  it('drops messages below the level', () => {
    const logger = createConsoleLogger('warn')
    logger.debug('x')
    logger.info('x')
    logger.warn('y')

    expect(console.debug).not.toHaveBeenCalled()
    expect(console.log).not.toHaveBeenCalled()
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('defaults to info', () => {
    const logger = createConsoleLogger()
    logger.debug('hidden')
    logger.info('shown')
    expect(console.debug).not.toHaveBeenCalled()
    expect(console.log).toHaveBeenCalledWith('[dpm] shown')
  })
})

describe('silentLogger', () => {
  it('writes nothing', () => {
    silentLogger.error('nothing')
    expect(console.error).not.toHaveBeenCalled()
  })
})

describe('resolveLogLevel', () => {
  it('maps quiet to error and verbose to debug', () => {
    expect(resolveLogLevel({ quiet: true })).toBe('error')
    expect(resolveLogLevel({ verbose: true })).toBe('debug')
    expect(resolveLogLevel({})).toBe('info')
  })

  it('lets quiet win over verbose', () => {
    expect(resolveLogLevel({ quiet: true, verbose: true })).toBe('error')
  })
})
