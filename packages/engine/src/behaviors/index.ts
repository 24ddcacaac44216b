/**
 * Behavior exports
 */

export type { IBehavior, UpdateContext } from './IBehavior'
export { getRandomDirection } from './IBehavior'
export { PowderBehavior, canPowderEnter } from './PowderBehavior'
export { LiquidBehavior } from './LiquidBehavior'
export { GasBehavior } from './GasBehavior'
export { FloatingBehavior } from './FloatingBehavior'
