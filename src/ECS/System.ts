import type { World } from './World.js'

/**
 * System interface for ECS processing.
 * Systems run once per world step, in registration order.
 */
export interface System {
    /** Unique name for debugging */
    name: string

    /** Called once when system is registered */
    init?(world: World): void

    /** Called each tick with the fixed step length (seconds) */
    update(world: World, dt: number): void
}

/**
 * Create a simple system from a configuration object.
 */
export function createSystem(config: {
    name: string
    init?: (world: World) => void
    update: (world: World, dt: number) => void
}): System {
    return config
}
