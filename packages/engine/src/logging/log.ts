/**
 * Engine logging
 *
 * All output goes through a `Logger`. The module helpers write to the active
 * sink (`consoleLogger` until `setLogger` swaps it); `World` and
 * `SimulationLoop` take `defaultLogger` unless one is injected. Debug and warn
 * output is gated by NODE_ENV=development or the THERMOSAND_DEBUG flags.
 */

export interface Logger {
  debug(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

function envValue(name: string): string | undefined {
  if (typeof process === 'undefined') return undefined
  return process.env[name]
}

function envFlag(name: string): boolean {
  const value = envValue(name)
  return value === 'true' || value === '1'
}

const DEBUG_LOGS =
  envValue('NODE_ENV') === 'development' ||
  envFlag('THERMOSAND_DEBUG_LOGS') ||
  envFlag('THERMOSAND_DEBUG')

export const consoleLogger: Logger = {
  debug: (...args) => {
    if (DEBUG_LOGS) console.debug(...args)
  },
  warn: (...args) => {
    if (DEBUG_LOGS) console.warn(...args)
  },
  error: (...args) => console.error(...args),
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
}

let sink: Logger = consoleLogger

/** Route the module helpers somewhere else; `null` restores the console */
export function setLogger(logger: Logger | null): void {
  sink = logger ?? consoleLogger
}

export type ErrorReporter = (error: unknown, context?: Record<string, unknown>) => void

let errorReporter: ErrorReporter | null = null

export function setErrorReporter(reporter: ErrorReporter | null): void {
  errorReporter = reporter
}

// Only the first argument travels as-is; the rest are reduced to strings or type names
function report(args: unknown[]): void {
  if (!errorReporter) return
  const [first] = args
  const error =
    first instanceof Error ? first : new Error(typeof first === 'string' ? first : 'Unknown error')
  errorReporter(error, { args: args.map((a) => (typeof a === 'string' ? a : typeof a)) })
}

export function debugLog(...args: unknown[]): void {
  sink.debug(...args)
}

export function debugWarn(...args: unknown[]): void {
  sink.warn(...args)
}

export function logError(...args: unknown[]): void {
  sink.error(...args)
  report(args)
}

/** Logger over the module helpers: follows `setLogger` and feeds the error reporter */
export const defaultLogger: Logger = {
  debug: debugLog,
  warn: debugWarn,
  error: logError,
}
