import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, renderProgressBar } from './logger'

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('renderProgressBar', () => {
    it('renders an empty bar at zero', () => {
      expect(renderProgressBar(0, 4)).toBe(`[${'░'.repeat(40)}] 0%`)
    })

    it('renders a half bar', () => {
      expect(renderProgressBar(2, 4)).toBe(`[${'█'.repeat(20)}${'░'.repeat(20)}] 50%`)
    })

    it('treats an empty total as complete', () => {
      expect(renderProgressBar(0, 0)).toBe(`[${'█'.repeat(40)}] 100%`)
    })
  })

  it('suppresses log and success when quiet', () => {
    const logger = createLogger(true, false)
    logger.log('hello')
    logger.success('done')
    logger.progress('row', 1, 2)
    expect(console.log).not.toHaveBeenCalled()
    expect(process.stdout.write).not.toHaveBeenCalled()
  })

  it('always prints warnings and errors', () => {
    const logger = createLogger(true, false)
    logger.warn('Row 2 not found: 00000, USA')
    logger.error('boom')
    expect(console.warn).toHaveBeenCalledWith('  ⚠ Row 2 not found: 00000, USA')
    expect(console.error).toHaveBeenCalledWith('  ✗ boom')
  })

  it('prints debug lines only when verbose', () => {
    createLogger(false, false).verbose('hidden')
    createLogger(false, true).verbose('shown')
    expect(console.log).toHaveBeenCalledTimes(1)
    expect(console.log).toHaveBeenCalledWith('  [debug] shown')
  })

  it('ends the progress line before a warning', () => {
    const logger = createLogger(false, false)
    logger.progress('1 ok', 1, 3)
    logger.warn('Row 2 not found: 00000, USA')
    const line = `\r  ${renderProgressBar(1, 3)} 1 ok`
    expect(process.stdout.write).toHaveBeenNthCalledWith(1, line)
    expect(process.stdout.write).toHaveBeenNthCalledWith(2, '\n')
  })

  it('ends the progress line when complete', () => {
    const logger = createLogger(false, false)
    logger.progress('done', 3, 3)
    expect(process.stdout.write).toHaveBeenLastCalledWith('\n')
  })
})
