import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { World } from '../ECS/World.js'
import { MissileTrailComponent, Renderer, ShipComponent, TransformComponent } from '../ECS/Components.js'
import { spawnShip } from '../ECS/Entities.js'
import { transformAt } from '../ECS/components/Transform.js'
import { createGameConfig } from '../ECS/GameConfig.js'
import { disc, polyline } from '../ECS/geometry/Shape.js'
import { AppLog } from '../AppLog.js'
import Vec3 from '../lib/Vector3.js'
import { clearLauncher, findActiveShip, fireMissile, type FireContext } from './FireCommand.js'
import { NOT_STARTED, playing } from './Turn.js'

const config = createGameConfig({ spawnStep: 0.5, missileMaxVelocity: 10, missileVelocityScale: 10, missileTimeToLive: 3 })

describe('FireCommand', () => {
    let world: World
    let ships: number[]

    beforeEach(() => {
        AppLog.clear()
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        world = new World()
        ships = [
            spawnShip(world, transformAt(new Vec3(0, 0, 0)), 0, disc(1)),
            spawnShip(world, transformAt(new Vec3(20, 0, 0)), 1, disc(1))
        ]
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    function context(overrides: Partial<FireContext> = {}): FireContext {
        return { world, phase: playing(0), config, ...overrides }
    }

    describe('fireMissile', () => {
        it('should spawn a missile just outside the launcher', () => {
            const result = fireMissile(context(), { angle: 0, speed: 2 })

            if (!result.ok) throw new Error(result.reason)
            expect(result.phase).toEqual(playing(0, 'firing'))

            const trail = world.requireComponent(result.missile, MissileTrailComponent)
            expect(trail.playerId).toBe(0)
            expect(trail.positions).toHaveLength(1)
            expect(trail.head.equal({ x: 1.5, y: 0, z: 0 })).toBe(true)
            expect(trail.velocity.equal({ x: 20, y: 0, z: 0 })).toBe(true)
            expect(trail.timeToLive).toBe(3)
            expect(world.requireComponent(result.missile, TransformComponent).position.equal(trail.head)).toBe(true)
            expect(AppLog.getEntries().map(e => e.message)).toEqual(['Player 0 fired: angle 0.000 rad, speed 2'])
        })

        it('should fire in the requested direction', () => {
            const result = fireMissile(context({ phase: playing(1) }), { angle: Math.PI, speed: 1 })

            if (!result.ok) throw new Error(result.reason)
            const trail = world.requireComponent(result.missile, MissileTrailComponent)
            expect(trail.head.x).toBeCloseTo(18.5, 12)
            expect(trail.head.y).toBeCloseTo(0, 12)
            expect(trail.velocity.x).toBeCloseTo(-10, 12)
        })

        it('should accept the speed limits', () => {
            expect(fireMissile(context(), { angle: 0, speed: 10 }).ok).toBe(true)
            expect(fireMissile(context(), { angle: 0, speed: 0 }).ok).toBe(true)
        })

        it('should attach a renderer for the shooter', () => {
            const render = vi.fn()
            const missileRenderer = vi.fn(() => ({ render }))

            const result = fireMissile(context({ missileRenderer }), { angle: 0, speed: 1 })

            if (!result.ok) throw new Error(result.reason)
            expect(missileRenderer).toHaveBeenCalledWith(0)
            expect(world.getComponent(result.missile, Renderer)?.render).toBe(render)
        })

        it.each([
            ['a NaN angle', { angle: NaN, speed: 1 }, 'INVALID_ANGLE'],
            ['an infinite angle', { angle: Infinity, speed: 1 }, 'INVALID_ANGLE'],
            ['a negative speed', { angle: 0, speed: -1 }, 'INVALID_SPEED'],
            ['a speed above the limit', { angle: 0, speed: 10.5 }, 'INVALID_SPEED'],
            ['a NaN speed', { angle: 0, speed: NaN }, 'INVALID_SPEED']
        ])('should reject %s without touching the world', (_name, params, code) => {
            const result = fireMissile(context(), params)

            expect(result).toMatchObject({ ok: false, code })
            expect(world.getEntityCount()).toBe(2)
        })

        it('should check parameters before the phase', () => {
            expect(fireMissile(context({ phase: NOT_STARTED }), { angle: 0, speed: -1 })).toMatchObject({ code: 'INVALID_SPEED' })
        })

        it('should reject outside a turn', () => {
            expect(fireMissile(context({ phase: NOT_STARTED }), { angle: 0, speed: 1 })).toMatchObject({ ok: false, code: 'NOT_PLAYING' })
            expect(fireMissile(context({ phase: { kind: 'gameOver', winner: 0 } }), { angle: 0, speed: 1 }))
                .toMatchObject({ ok: false, code: 'NOT_PLAYING' })
            expect(world.getEntityCount()).toBe(2)
        })

        it('should reject a second shot in the same turn', () => {
            const result = fireMissile(context({ phase: playing(0, 'firing') }), { angle: 0, speed: 1 })

            expect(result).toEqual({ ok: false, code: 'NOT_AIMING', reason: 'player 0 already fired' })
            expect(AppLog.getEntries()[0]).toMatchObject({ level: 'warn', message: 'Fire rejected (NOT_AIMING): player 0 already fired' })
        })

        it('should reject a player without an active ship', () => {
            world.requireComponent(ships[1], ShipComponent).state = 'disabled'

            expect(fireMissile(context({ phase: playing(1) }), { angle: 0, speed: 1 })).toMatchObject({ ok: false, code: 'NO_SHIP' })
            expect(world.getEntityCount()).toBe(2)
        })
    })

    describe('findActiveShip', () => {
        it('should find the ship of a player', () => {
            expect(findActiveShip(world, 1)).toBe(ships[1])
            expect(findActiveShip(world, 2)).toBeUndefined()
        })
    })

    describe('clearLauncher', () => {
        it('should step past the hull bounding radius', () => {
            const start = clearLauncher(transformAt(new Vec3(0, 0, 0)), disc(1), new Vec3(0, 1, 0), 0.5)
            expect(start.equal({ x: 0, y: 1.5, z: 0 })).toBe(true)
        })

        it('should walk out of a polyline hull', () => {
            const square = polyline([{ x: -1, y: -1 }, { x: 1, y: -1 }, { x: 1, y: 1 }, { x: -1, y: 1 }, { x: -1, y: -1 }])
            const start = clearLauncher(transformAt(new Vec3(2, 0, 0)), square, new Vec3(1, 0, 0), 0.5)
            // Bounding radius is √2, so 1.5 is the first step clear of it
            expect(start.equal({ x: 3.5, y: 0, z: 0 })).toBe(true)
        })

        it('should refuse a non-positive step', () => {
            expect(() => clearLauncher(transformAt(new Vec3(0, 0, 0)), disc(1), new Vec3(1, 0, 0), 0))
                .toThrow('spawnStep must be positive, got 0')
        })
    })
})
