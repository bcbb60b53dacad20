import Vec3 from '../../lib/Vector3.js'
import { type System, createSystem } from '../System.js'
import type { EntityId, World } from '../World.js'
import { CollisionShape, MissileTrailComponent, TransformComponent } from '../Components.js'
import { type MissileTrail } from '../components/MissileTrail.js'
import { collisionTransform } from '../components/Transform.js'
import { timeOfImpact } from '../geometry/Shape.js'
import { gravityAt } from '../Entities.js'
import type { GameConfig } from '../GameConfig.js'

export type MissileEvent =
    | { kind: 'hit'; missile: EntityId; target: EntityId }
    | { kind: 'expired'; missile: EntityId }

/**
 * Time within the next tick at which the trail's head, moving at its current
 * velocity, meets `other`'s collision shape. Solid cast: a head already
 * inside the shape hits at 0.
 */
export function timeToCollision(
    trail: MissileTrail,
    from: Vec3,
    world: World,
    other: EntityId,
    maxTime: number
): number | undefined {
    const shape = world.getComponent(other, CollisionShape)
    const transform = world.getComponent(other, TransformComponent)
    if (!shape || !transform) return undefined

    const direction = trail.velocity.xy()
    if (direction.lenSq() === 0) return undefined

    return timeOfImpact(shape, collisionTransform(transform), from.xy(), direction, maxTime, true)
}

/**
 * Advance one missile by one tick.
 *
 * Every other entity, in creation order, is first ray-tested against the
 * missile's path for this tick and, if missed, contributes its gravity to the
 * velocity. The first hit ends the flight at the exact impact point and stops
 * the scan, so entities after it add no gravity this tick.
 */
export function updateMissileTrail(
    world: World,
    missile: EntityId,
    trail: MissileTrail,
    config: GameConfig
): MissileEvent | undefined {
    if (!trail.isLive) return undefined

    const { tickInterval, gravitationalConstant } = config
    const lastPos = trail.head.copy()
    trail.timeToLive -= tickInterval

    for (const other of world.entities()) {
        if (other === missile) continue

        const toi = timeToCollision(trail, lastPos, world, other, tickInterval)
        if (toi !== undefined) {
            trail.timeToLive = 0
            trail.addPosition(Vec3.add(lastPos, Vec3.scale(trail.velocity, toi)))
            return { kind: 'hit', missile, target: other }
        }
        trail.velocity.add(gravityAt(world, other, lastPos, gravitationalConstant))
    }

    trail.addPosition(Vec3.add(lastPos, Vec3.scale(trail.velocity, tickInterval)))

    if (!trail.isLive) {
        return { kind: 'expired', missile }
    }
    return undefined
}

/**
 * Missile integrator.
 * Steps every live trail, keeps the missile's transform on the trail head and
 * publishes outcomes as `missileHit` / `missileExpired` world events.
 */
export function createMissileSystem(config: GameConfig): System {
    return createSystem({
        name: 'Missiles',

        update(world: World): void {
            for (const id of world.query(MissileTrailComponent)) {
                const trail = world.requireComponent(id, MissileTrailComponent)
                if (!trail.isLive) continue

                const event = updateMissileTrail(world, id, trail, config)
                world.requireComponent(id, TransformComponent).position.set(trail.head)

                if (event?.kind === 'hit') {
                    world.emit('missileHit', { missile: id, target: event.target })
                } else if (event?.kind === 'expired') {
                    world.emit('missileExpired', { missile: id })
                }
            }
        }
    })
}

/** True while any missile is still in flight */
export function hasLiveMissiles(world: World): boolean {
    return world.query(MissileTrailComponent)
        .some(id => world.requireComponent(id, MissileTrailComponent).isLive)
}
