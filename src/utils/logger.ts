import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface LoggerOptions {
  prefix?: string
  timestamp?: boolean
  silent?: boolean
  forceColor?: boolean | undefined
  debug?: boolean
}

export interface Logger {
  info: (message: string, ...args: unknown[]) => void
  success: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug: (message: string, ...args: unknown[]) => void
  setDebug: (enabled: boolean) => void
  isDebugEnabled: () => boolean
}

// info/success/debug go to stdout, warn/error to stderr
const stdoutChalk = new Chalk({ level: chalk.level })
const stderrChalk = new Chalk({ level: chalk.level })

function formatMessage(message: string, ...args: unknown[]): string {
  const formattedArgs = args.map(arg =>
    typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
  )
  return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

function formatWithEmoji(message: string, emoji: string, colorFn: (str: string) => string): string {
  if (message.trim()) {
    return colorFn(`${emoji} ${message}`)
  }
  return ''
}

interface LineWriterOptions {
  prefix: string
  timestamp: boolean
  stdout: ChalkInstance
  stderr: ChalkInstance
}

/* eslint-disable no-console */
function createLineWriters(options: LineWriterOptions): Record<'info' | 'success' | 'warn' | 'error' | 'debug', (message: string, ...args: unknown[]) => void> {
  const prefixStr = options.prefix ? `[${options.prefix}] ` : ''
  const line = (message: string, args: unknown[]): string => {
    const timestampStr = options.timestamp ? `[${new Date().toISOString()}] ` : ''
    return `${timestampStr}${prefixStr}${formatMessage(message, ...args)}`
  }

  return {
    info: (message, ...args) => console.log(formatWithEmoji(line(message, args), '📄', options.stdout.blue)),
    success: (message, ...args) => console.log(formatWithEmoji(line(message, args), '✅', options.stdout.green)),
    warn: (message, ...args) => console.error(formatWithEmoji(line(message, args), '⚠️ ', options.stderr.yellow)),
    error: (message, ...args) => console.error(formatWithEmoji(line(message, args), '❌', options.stderr.red)),
    debug: (message, ...args) => console.log(formatWithEmoji(line(message, args), '🔍', options.stdout.gray)),
  }
}
/* eslint-enable no-console */

let globalDebugEnabled = false

const defaultWriters = createLineWriters({ prefix: '', timestamp: false, stdout: stdoutChalk, stderr: stderrChalk })

export const logger: Logger = {
  info: defaultWriters.info,
  success: defaultWriters.success,
  warn: defaultWriters.warn,
  error: defaultWriters.error,

  debug: (message: string, ...args: unknown[]): void => {
    if (globalDebugEnabled) {
      defaultWriters.debug(message, ...args)
    }
  },

  setDebug: (enabled: boolean): void => {
    globalDebugEnabled = enabled
  },

  isDebugEnabled: (): boolean => {
    return globalDebugEnabled
  },
}

/**
 * Factory for logger instances with their own prefix, timestamps or debug flag.
 * A silent logger discards everything (used to keep command tests quiet).
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { prefix = '', timestamp = false, silent = false, forceColor, debug = globalDebugEnabled } = options

  if (silent) {
    return {
      info: (): void => {},
      success: (): void => {},
      warn: (): void => {},
      error: (): void => {},
      debug: (): void => {},
      setDebug: (): void => {},
      isDebugEnabled: (): boolean => false,
    }
  }

  let localDebugEnabled = debug

  const forcedChalk = forceColor !== undefined ? new Chalk({ level: forceColor ? 3 : 0 }) : undefined
  const writers = createLineWriters({
    prefix,
    timestamp,
    stdout: forcedChalk ?? stdoutChalk,
    stderr: forcedChalk ?? stderrChalk,
  })

  return {
    info: writers.info,
    success: writers.success,
    warn: writers.warn,
    error: writers.error,
    debug: (message: string, ...args: unknown[]): void => {
      if (localDebugEnabled) {
        writers.debug(message, ...args)
      }
    },
    setDebug: (enabled: boolean): void => {
      localDebugEnabled = enabled
    },
    isDebugEnabled: (): boolean => localDebugEnabled,
  }
}

export default logger
