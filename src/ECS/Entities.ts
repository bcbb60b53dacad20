import Vec3, { type IVec3 } from '../lib/Vector3.js'
import {
    TransformComponent,
    Mass,
    CollisionShape,
    Renderer,
    MissileTrailComponent,
    ShipComponent,
    type EntityRenderer
} from './Components.js'
import { MissileTrail } from './components/MissileTrail.js'
import { createShip } from './components/Ship.js'
import { type Transform } from './components/Transform.js'
import { type Shape } from './geometry/Shape.js'
import type { EntityId, World } from './World.js'

// Construction helpers. These are the only component combinations gameplay produces:
//   planet:  transform + mass + shape
//   ship:    transform + shape + ship (massless)
//   missile: transform + trail (massless, no shape)

export function spawnPlanet(
    world: World,
    transform: Transform,
    mass: number,
    shape: Shape,
    renderer?: EntityRenderer
): EntityId {
    const id = world.createEntity()
    world.addComponent(id, TransformComponent, transform)
    world.addComponent(id, Mass, mass)
    world.addComponent(id, CollisionShape, shape)
    if (renderer) world.addComponent(id, Renderer, renderer)
    return id
}

export function spawnShip(
    world: World,
    transform: Transform,
    playerId: number,
    shape: Shape,
    renderer?: EntityRenderer
): EntityId {
    const id = world.createEntity()
    world.addComponent(id, TransformComponent, transform)
    world.addComponent(id, Mass, 0)
    world.addComponent(id, CollisionShape, shape)
    world.addComponent(id, ShipComponent, createShip(playerId))
    if (renderer) world.addComponent(id, Renderer, renderer)
    return id
}

export function spawnMissile(
    world: World,
    transform: Transform,
    trail: MissileTrail,
    renderer?: EntityRenderer
): EntityId {
    const id = world.createEntity()
    world.addComponent(id, TransformComponent, transform)
    world.addComponent(id, Mass, 0)
    world.addComponent(id, MissileTrailComponent, trail)
    if (renderer) world.addComponent(id, Renderer, renderer)
    return id
}

/**
 * Acceleration a body of `mass` at `source` imparts on `point`, applied once per tick.
 *
 * Magnitude grows with the square of the distance (d² · m · G), not its
 * inverse: far bodies pull hardest.
 */
export function gravitationalAcceleration(
    source: IVec3,
    mass: number,
    point: IVec3,
    G: number
): Vec3 {
    const difference = Vec3.sub(source, point)
    const strength = difference.lenSq() * mass * G
    return Vec3.normalize(difference).scale(strength)
}

/** Pull of one entity on a point; massless or placeless entities pull with zero */
export function gravityAt(world: World, entity: EntityId, point: IVec3, G: number): Vec3 {
    const transform = world.getComponent(entity, TransformComponent)
    const mass = world.getComponent(entity, Mass) ?? 0
    if (!transform || mass === 0) return Vec3.zero()
    return gravitationalAcceleration(transform.position, mass, point, G)
}
