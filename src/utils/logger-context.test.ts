import { describe, it, expect } from 'vitest'
import { setTimeout } from 'node:timers/promises'
import { getLogger, withLogger } from './logger-context.js'
import { logger as defaultLogger, createLogger } from './logger.js'

describe('logger-context', () => {
  describe('getLogger', () => {
    it('returns the default logger when no context is set', () => {
      expect(getLogger()).toBe(defaultLogger)
    })

    it('returns the context logger inside withLogger and the default after it', () => {
      const customLogger = createLogger({ silent: true })

      withLogger(customLogger, () => {
        expect(getLogger()).toBe(customLogger)
      })

      expect(getLogger()).toBe(defaultLogger)
    })
  })

  describe('withLogger', () => {
    it('returns the result of a synchronous function', () => {
      const result = withLogger(createLogger({ silent: true }), () => 'sync result')
      expect(result).toBe('sync result')
    })

    it('keeps the context logger across awaits', async () => {
      const customLogger = createLogger({ silent: true })

      const result = await withLogger(customLogger, async () => {
        await setTimeout(5)
        expect(getLogger()).toBe(customLogger)
        return 'async result'
      })

      expect(result).toBe('async result')
    })
  })
})
