import type { Transform } from './components/Transform.js'
import type { MissileTrail } from './components/MissileTrail.js'
import type { Ship } from './components/Ship.js'
import type { Shape } from './geometry/Shape.js'
import type { EntityId, World } from './World.js'

// Component type symbols for type-safe component access
export const TransformComponent = Symbol('Transform')
export const Mass = Symbol('Mass')
export const CollisionShape = Symbol('CollisionShape')
export const Renderer = Symbol('Renderer')
export const MissileTrailComponent = Symbol('MissileTrail')
export const ShipComponent = Symbol('Ship')

/**
 * Handle to an external rendering collaborator.
 * The simulation only stores and passes it; one handle may be shared by many entities.
 */
export interface EntityRenderer {
    render(entity: EntityId, world: World): void
}

// Type mapping from symbols to their data types
export interface ComponentTypes {
    [TransformComponent]: Transform
    [Mass]: number              // 0 for massless objects
    [CollisionShape]: Shape     // owned by its entity
    [Renderer]: EntityRenderer
    [MissileTrailComponent]: MissileTrail
    [ShipComponent]: Ship
}

// Helper type for component keys
export type ComponentKey = keyof ComponentTypes

