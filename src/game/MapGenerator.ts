import { AppLog } from '../AppLog.js'
import Vec3 from '../lib/Vector3.js'
import Quat from '../lib/Quaternion.js'
import { color, type Rgb } from '../lib/common.js'
import type { Random } from '../lib/Random.js'
import { CollisionShape, TransformComponent, type EntityRenderer } from '../ECS/Components.js'
import { collisionTransform, transformAt, type Transform } from '../ECS/components/Transform.js'
import { spawnPlanet, spawnShip } from '../ECS/Entities.js'
import { DEFAULT_GAME_CONFIG, planetMass, type GameConfig } from '../ECS/GameConfig.js'
import { boundingRadius, cloneShape, disc, proximity, type Shape } from '../ECS/geometry/Shape.js'
import { World, type EntityId } from '../ECS/World.js'
import { createPlayers, DEFAULT_PALETTE, type Player } from './Player.js'

export interface Arena {
    width: number
    height: number
}

export interface MapGenOptions extends Arena {
    playerCount: number
    random: Random
    config?: GameConfig
    /** Mesh-derived hull for every ship; a disc of `config.shipRadius` otherwise */
    shipShape?: Shape
    planetRenderer?: EntityRenderer
    shipRenderer?: EntityRenderer
    palette?: readonly Readonly<Rgb>[]
}

export type MapGenErrorCode = 'PLACEMENT_FAILED' | 'INVALID_ARENA' | 'INVALID_PLAYER_COUNT'

export type MapGenResult =
    | { ok: true; world: World; players: Player[]; planets: EntityId[]; ships: EntityId[] }
    | { ok: false; code: MapGenErrorCode; reason: string }

export type PlacementResult =
    | { ok: true; transform: Transform }
    | { ok: false; code: 'PLACEMENT_FAILED'; reason: string }

/**
 * Rejection sampling: draw a uniform position in the arena (inset so the
 * shape stays inside), and accept it once the shape is disjoint from every
 * shape already in the world.
 */
export function placeEntity(
    world: World,
    shape: Shape,
    makeTransform: (position: Vec3) => Transform,
    arena: Arena,
    random: Random,
    config: GameConfig
): PlacementResult {
    const radius = boundingRadius(shape)
    const halfWidth = Math.max(0, arena.width / 2 - radius)
    const halfHeight = Math.max(0, arena.height / 2 - radius)
    const placed = world.query(CollisionShape, TransformComponent).map(id => ({
        shape: world.requireComponent(id, CollisionShape),
        iso: collisionTransform(world.requireComponent(id, TransformComponent))
    }))

    for (let attempt = 0; attempt < config.maxPlacementAttempts; attempt++) {
        const position = new Vec3(
            random.uniform(-halfWidth, halfWidth),
            random.uniform(-halfHeight, halfHeight),
            0
        )
        const transform = makeTransform(position)
        const iso = collisionTransform(transform)

        const clear = placed.every(other =>
            proximity(shape, iso, other.shape, other.iso, config.proximityMargin) === 'disjoint')
        if (clear) {
            return { ok: true, transform }
        }
    }

    return {
        ok: false,
        code: 'PLACEMENT_FAILED',
        reason: `no free spot for a ${shape.kind} of radius ${radius.toFixed(2)} after ${config.maxPlacementAttempts} attempts`
    }
}

/** Planet count for the arena: density sample times area, at least one */
export function samplePlanetCount(arena: Arena, random: Random, config: GameConfig): number {
    const density = random.normal(config.planetDensityMean, config.planetDensityStdDev)
    return Math.max(1, Math.floor(density * arena.width * arena.height))
}

/**
 * Build a fresh world: planets first, then one ship per player.
 * Any placement failure abandons the whole world; the caller may retry with
 * the (now advanced) random source.
 */
export function generateMap(options: MapGenOptions): MapGenResult {
    const { width, height, playerCount, random } = options
    const config = options.config ?? DEFAULT_GAME_CONFIG

    if (!(width > 0) || !(height > 0) || !Number.isFinite(width) || !Number.isFinite(height)) {
        return { ok: false, code: 'INVALID_ARENA', reason: `arena must have positive size, got ${width} x ${height}` }
    }
    if (!Number.isInteger(playerCount) || playerCount < 1) {
        return { ok: false, code: 'INVALID_PLAYER_COUNT', reason: `need at least one player, got ${playerCount}` }
    }

    const world = new World()
    const arena: Arena = { width, height }
    const planets: EntityId[] = []
    const ships: EntityId[] = []

    const planetCount = samplePlanetCount(arena, random, config)
    for (let i = 0; i < planetCount; i++) {
        const radius = Math.max(config.planetRadiusMin, random.normal(config.planetRadiusMean, config.planetRadiusStdDev))
        const density = Math.max(0, random.normal(config.planetMaterialDensityMean, config.planetMaterialDensityStdDev))
        const shape = disc(radius)

        const placement = placeEntity(world, shape, pos => transformAt(pos, Quat.identity(), radius), arena, random, config)
        if (!placement.ok) {
            AppLog.warn(`Map generation failed on planet ${i + 1}/${planetCount}: ${placement.reason}`)
            return placement
        }
        planets.push(spawnPlanet(world, placement.transform, planetMass(radius, density), shape, options.planetRenderer))
    }

    const players = createPlayers(playerCount, options.palette ?? DEFAULT_PALETTE)
    for (const player of players) {
        const shape = options.shipShape ? cloneShape(options.shipShape) : disc(config.shipRadius)
        const placement = placeEntity(
            world,
            shape,
            pos => transformAt(pos, Quat.fromYaw(random.uniform(0, 2 * Math.PI))),
            arena,
            random,
            config
        )
        if (!placement.ok) {
            AppLog.warn(`Map generation failed on ship of player ${player.id}: ${placement.reason}`)
            return placement
        }
        ships.push(spawnShip(world, placement.transform, player.id, shape, options.shipRenderer))
    }

    AppLog.info(`Generated ${width} x ${height} map: ${planets.length} planets, ${ships.length} ships`
        + ` (${players.map(p => color(p.color)).join(', ')})`)
    return { ok: true, world, players, planets, ships }
}
