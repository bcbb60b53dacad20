import { AppLog } from '../AppLog.js'
import Vec3 from '../lib/Vector3.js'
import { CollisionShape, ShipComponent, TransformComponent, type EntityRenderer } from '../ECS/Components.js'
import { MissileTrail } from '../ECS/components/MissileTrail.js'
import { collisionTransform, transformAt, type Transform } from '../ECS/components/Transform.js'
import { spawnMissile } from '../ECS/Entities.js'
import type { GameConfig } from '../ECS/GameConfig.js'
import { boundingRadius, timeOfImpact, type Shape } from '../ECS/geometry/Shape.js'
import type { EntityId, World } from '../ECS/World.js'
import type { FireParams } from './InputEvent.js'
import type { GamePhase } from './Turn.js'

export type FireErrorCode = 'INVALID_ANGLE' | 'INVALID_SPEED' | 'NOT_PLAYING' | 'NOT_AIMING' | 'NO_SHIP'

export type FireResult =
    | { ok: true; missile: EntityId; phase: GamePhase }
    | { ok: false; code: FireErrorCode; reason: string }

export interface FireContext {
    world: World
    phase: GamePhase
    config: GameConfig
    /** Called once per accepted shot */
    missileRenderer?: (playerId: number) => EntityRenderer
}

function reject(code: FireErrorCode, reason: string): FireResult {
    AppLog.warn(`Fire rejected (${code}): ${reason}`)
    return { ok: false, code, reason }
}

/** The current player's active ship, if any */
export function findActiveShip(world: World, playerId: number): EntityId | undefined {
    return world.query(ShipComponent, TransformComponent, CollisionShape).find(id => {
        const ship = world.requireComponent(id, ShipComponent)
        return ship.playerId === playerId && ship.state === 'active'
    })
}

/**
 * Walk from the launcher's centre along `direction` in `step` increments until
 * the point is past the hull's bounding radius and outside the hull itself,
 * so the new missile does not hit its own ship on the first tick.
 */
export function clearLauncher(launcher: Transform, hull: Shape, direction: Vec3, step: number): Vec3 {
    if (!(step > 0)) {
        throw new Error(`spawnStep must be positive, got ${step}`)
    }
    const centre = launcher.position
    const iso = collisionTransform(launcher)
    const radius = boundingRadius(hull)
    const ray = direction.xy()
    const stride = Vec3.scale(direction, step)

    const pos = centre.copy()
    while (pos.distanceTo(centre) <= radius || timeOfImpact(hull, iso, pos.xy(), ray, 0, true) !== undefined) {
        pos.add(stride)
    }
    return pos
}

/**
 * Fire the current player's ship.
 *
 * Every check runs before anything is touched: a rejected command leaves
 * the world and phase exactly as they were.
 */
export function fireMissile(ctx: FireContext, params: FireParams): FireResult {
    const { world, phase, config } = ctx
    const { angle, speed } = params

    if (!Number.isFinite(angle)) {
        return reject('INVALID_ANGLE', `angle must be finite, got ${angle}`)
    }
    if (!Number.isFinite(speed) || speed < 0 || speed > config.missileMaxVelocity) {
        return reject('INVALID_SPEED', `speed must be within 0..${config.missileMaxVelocity}, got ${speed}`)
    }
    if (phase.kind !== 'playing') {
        return reject('NOT_PLAYING', `no turn in progress (phase: ${phase.kind})`)
    }
    if (phase.turn.state !== 'aiming') {
        return reject('NOT_AIMING', `player ${phase.turn.currentPlayer} already fired`)
    }

    const playerId = phase.turn.currentPlayer
    const shipId = findActiveShip(world, playerId)
    if (shipId === undefined) {
        return reject('NO_SHIP', `player ${playerId} has no active ship`)
    }

    const launcher = world.requireComponent(shipId, TransformComponent)
    const hull = world.requireComponent(shipId, CollisionShape)

    const direction = new Vec3(Math.cos(angle), Math.sin(angle), 0)
    const velocity = Vec3.scale(direction, speed * config.missileVelocityScale)
    const start = clearLauncher(launcher, hull, direction, config.spawnStep)

    const trail = new MissileTrail(playerId, start, velocity, config.missileTimeToLive)
    const missile = spawnMissile(world, transformAt(start.copy()), trail, ctx.missileRenderer?.(playerId))

    AppLog.info(`Player ${playerId} fired: angle ${angle.toFixed(3)} rad, speed ${speed}`)
    return { ok: true, missile, phase: { kind: 'playing', turn: { currentPlayer: playerId, state: 'firing' } } }
}
