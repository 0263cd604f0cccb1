import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, defaultLogLevel, isLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should prefix messages', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    createLogger('[drivepath]', { level: 'info' }).info('hello', 42)
    expect(info).toHaveBeenCalledWith('[drivepath]', 'hello', 42)
  })

  it('should drop messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger('[test]', { level: 'warn' })

    logger.debug('hidden')
    logger.warn('shown')

    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should change level at run time', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const logger = createLogger('[test]', { level: 'silent' })

    logger.setLevel('debug')
    logger.debug('now visible')

    expect(logger.level).toBe('debug')
    expect(debug).toHaveBeenCalledWith('[test]', 'now visible')
  })

  it('should resolve the default level from the environment', () => {
    expect(defaultLogLevel({ DRIVEPATH_LOG_LEVEL: 'error', DRIVEPATH_DEBUG: '1' })).toBe('error')
    expect(defaultLogLevel({ DRIVEPATH_LOG_LEVEL: 'loud', DRIVEPATH_DEBUG: '1' })).toBe('debug')
    expect(defaultLogLevel({})).toBe('info')
  })

  it('should recognise level names', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })
})
