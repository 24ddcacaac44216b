import { describe, it, expect, vi, afterEach } from 'vitest'
import { InvalidArgumentError, InvalidDimensionError, SimulationError } from '../errors'
import {
  debugLog,
  debugWarn,
  defaultLogger,
  logError,
  setErrorReporter,
  setLogger,
  silentLogger,
} from '../logging/log'
import type { Logger } from '../logging/log'
import { DEFAULT_WORLD_SETTINGS, resolveWorldSettings, validatePressure, validateTemperature } from '../config'

describe('errors', () => {
  it('keeps the class hierarchy and names', () => {
    const err = new InvalidDimensionError('width must be >= 1')
    expect(err).toBeInstanceOf(InvalidDimensionError)
    expect(err).toBeInstanceOf(SimulationError)
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('InvalidDimensionError')
    expect(new InvalidArgumentError('x').name).toBe('InvalidArgumentError')
  })
})

describe('logging', () => {
  afterEach(() => {
    setErrorReporter(null)
    setLogger(null)
    vi.restoreAllMocks()
  })

  it('forwards errors to the reporter', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const reporter = vi.fn()
    setErrorReporter(reporter)
    const boom = new Error('boom')

    logError(boom, 'during step')

    expect(reporter).toHaveBeenCalledWith(boom, { args: ['object', 'during step'] })
  })

  it('wraps string messages for the reporter', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const reporter = vi.fn()
    setErrorReporter(reporter)

    defaultLogger.error('Simulation crashed:', 42)

    expect(reporter).toHaveBeenCalledTimes(1)
    const [error] = reporter.mock.calls[0]
    expect(error).toBeInstanceOf(Error)
    expect(error).toHaveProperty('message', 'Simulation crashed:')
  })

  it('delivers module helpers through the active logger', () => {
    const sink: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogger(sink)

    debugLog('tick', 3)
    debugWarn('reset cell')
    defaultLogger.error('crashed')

    expect(sink.debug).toHaveBeenCalledWith('tick', 3)
    expect(sink.warn).toHaveBeenCalledWith('reset cell')
    expect(sink.error).toHaveBeenCalledWith('crashed')
    expect(consoleError).not.toHaveBeenCalled()
  })

  it('goes back to the console when the logger is cleared', () => {
    const sink: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogger(sink)
    setLogger(null)

    logError('lost')

    expect(sink.error).not.toHaveBeenCalled()
    expect(consoleError).toHaveBeenCalledWith('lost')
  })

  it('has a logger that discards everything', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    silentLogger.error('ignored')
    expect(spy).not.toHaveBeenCalled()
  })
})

describe('config', () => {
  it('fills defaults', () => {
    expect(resolveWorldSettings()).toEqual(DEFAULT_WORLD_SETTINGS)
    expect(resolveWorldSettings({ ambientTemperature: 5 })).toEqual({ ambientTemperature: 5, ambientPressure: 101_325 })
  })

  it('clamps temperatures into range', () => {
    expect(validateTemperature(20_000)).toBe(10_000)
    expect(validateTemperature(-500)).toBe(-273)
  })

  it('rejects bad values', () => {
    expect(() => resolveWorldSettings({ ambientPressure: -1 })).toThrow(InvalidArgumentError)
    expect(() => validatePressure(Number.NaN)).toThrow(InvalidArgumentError)
    expect(() => validateTemperature(Number.NaN)).toThrow(InvalidArgumentError)
  })
})
