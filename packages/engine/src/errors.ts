/**
 * Error conditions surfaced by the engine.
 * Only construction and explicit mutation calls throw; a tick never does.
 */

export class SimulationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Width or height is not a positive finite number */
export class InvalidDimensionError extends SimulationError {}

/** A mutator received a missing material or a non-finite value */
export class InvalidArgumentError extends SimulationError {}
