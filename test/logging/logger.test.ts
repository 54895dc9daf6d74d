import type { MockInstance } from 'vitest'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import pc from 'picocolors'

import { formatLogLine, logger } from '../../core/logging/logger'

describe('formatLogLine', () => {
  it('prefixes the message with timestamp and level', () => {
    let now = new Date('2024-06-01T12:00:00.000Z')

    expect(formatLogLine('INFO', 'Found target tag: 2024.06', now)).toBe(
      `${pc.gray('2024-06-01T12:00:00.000Z')} - ${pc.cyan('INFO')} - Found target tag: 2024.06`,
    )
    expect(formatLogLine('ERROR', 'boom', now)).toBe(
      `${pc.gray('2024-06-01T12:00:00.000Z')} - ${pc.redBright('ERROR')} - boom`,
    )
  })
})

describe('logger', () => {
  let infoSpy: MockInstance
  let warnSpy: MockInstance
  let errorSpy: MockInstance

  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-06-01T12:00:00.000Z'))
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('routes levels to console methods', () => {
    let now = new Date('2024-06-01T12:00:00.000Z')

    logger.info('a')
    logger.success('b')
    logger.warn('c')
    logger.error('d')

    expect(infoSpy).toHaveBeenNthCalledWith(1, formatLogLine('INFO', 'a', now))
    expect(infoSpy).toHaveBeenNthCalledWith(
      2,
      formatLogLine('SUCCESS', 'b', now),
    )
    expect(warnSpy).toHaveBeenCalledWith(formatLogLine('WARN', 'c', now))
    expect(errorSpy).toHaveBeenCalledWith(formatLogLine('ERROR', 'd', now))
  })
})
