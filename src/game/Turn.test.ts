import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { World } from '../ECS/World.js'
import { ShipComponent } from '../ECS/Components.js'
import { spawnPlanet, spawnShip } from '../ECS/Entities.js'
import { transformAt } from '../ECS/components/Transform.js'
import { disc } from '../ECS/geometry/Shape.js'
import { AppLog } from '../AppLog.js'
import Vec3 from '../lib/Vector3.js'
import {
    NOT_STARTED,
    activePlayers,
    advanceAfterResolution,
    applyMissileEvents,
    currentTurn,
    firstPhase,
    nextPhase,
    playing,
    startGame,
    type GamePhase
} from './Turn.js'

function subsets(n: number): Set<number>[] {
    const result: Set<number>[] = []
    for (let mask = 0; mask < 1 << n; mask++) {
        const set = new Set<number>()
        for (let p = 0; p < n; p++) {
            if (mask & (1 << p)) set.add(p)
        }
        result.push(set)
    }
    return result
}

describe('Turn', () => {
    beforeEach(() => {
        AppLog.clear()
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    describe('nextPhase', () => {
        it('should pick the first eligible player after the current one for every small game', () => {
            for (let n = 1; n <= 4; n++) {
                for (const remaining of subsets(n)) {
                    for (let current = 0; current < n; current++) {
                        const phase = nextPhase({ currentPlayer: current, state: 'firing' }, n, remaining)

                        const others = [...remaining].filter(p => p !== current)
                        if (others.length === 0) {
                            expect(phase.kind).toBe('gameOver')
                            continue
                        }

                        const turn = currentTurn(phase)
                        expect(turn?.state).toBe('aiming')
                        const chosen = turn?.currentPlayer ?? -1
                        expect(chosen).not.toBe(current)
                        expect(remaining.has(chosen)).toBe(true)
                        // Nobody eligible is skipped on the way round
                        const distance = (chosen - current + n) % n
                        for (let step = 1; step < distance; step++) {
                            expect(remaining.has((current + step) % n)).toBe(false)
                        }
                    }
                }
            }
        })

        it('should wrap around three players', () => {
            const all = new Set([0, 1, 2])
            let phase: GamePhase = playing(0, 'firing')
            const order: number[] = []

            for (let i = 0; i < 4; i++) {
                const turn = currentTurn(phase)
                if (!turn) throw new Error('expected a turn')
                phase = nextPhase(turn, 3, all)
                order.push(currentTurn(phase)?.currentPlayer ?? -1)
            }

            expect(order).toEqual([1, 2, 0, 1])
        })

        it('should skip eliminated players', () => {
            expect(nextPhase({ currentPlayer: 0, state: 'firing' }, 4, new Set([0, 3]))).toEqual(playing(3))
        })

        it('should end the game with the last survivor as winner', () => {
            expect(nextPhase({ currentPlayer: 1, state: 'firing' }, 2, new Set([1]))).toEqual({ kind: 'gameOver', winner: 1 })
        })

        it('should end the game without a winner when nobody is left', () => {
            expect(nextPhase({ currentPlayer: 0, state: 'firing' }, 2, new Set())).toEqual({ kind: 'gameOver' })
        })

        it('should end an empty game', () => {
            expect(nextPhase({ currentPlayer: 0, state: 'firing' }, 0, new Set())).toEqual({ kind: 'gameOver' })
        })
    })

    describe('firstPhase', () => {
        it('should start with the lowest active player', () => {
            expect(firstPhase(3, new Set([2, 1]))).toEqual(playing(1))
        })

        it('should be over immediately without active players', () => {
            expect(firstPhase(3, new Set())).toEqual({ kind: 'gameOver' })
        })

        it('should ignore players outside the game', () => {
            expect(firstPhase(2, new Set([5]))).toEqual({ kind: 'gameOver' })
        })
    })

    describe('with a world', () => {
        let world: World
        let ships: number[]

        beforeEach(() => {
            world = new World()
            spawnPlanet(world, transformAt(new Vec3(0, 0, 0)), 1, disc(2))
            ships = [0, 1, 2].map(p => spawnShip(world, transformAt(new Vec3(10 * (p + 1), 0, 0)), p, disc(1)))
        })

        it('should read active players off the ships', () => {
            expect(activePlayers(world)).toEqual(new Set([0, 1, 2]))
            world.requireComponent(ships[1], ShipComponent).state = 'disabled'
            expect(activePlayers(world)).toEqual(new Set([0, 2]))
        })

        it('should start the game once', () => {
            const phase = startGame(world, NOT_STARTED, 3)
            expect(phase).toEqual(playing(0))
            expect(AppLog.getEntries().map(e => e.message)).toEqual(['Player 0 to aim'])

            expect(startGame(world, phase, 3)).toBe(phase)
            expect(AppLog.getEntries()[1]).toMatchObject({ level: 'warn', message: 'Game already in progress' })
        })

        it('should disable ships that were hit and ignore other outcomes', () => {
            const disabled = applyMissileEvents(world, [
                { kind: 'hit', missile: 99, target: ships[2] },
                { kind: 'hit', missile: 98, target: 0 },
                { kind: 'expired', missile: 97 },
                { kind: 'hit', missile: 96, target: ships[2] }
            ])

            expect(disabled).toEqual([ships[2]])
            expect(world.requireComponent(ships[2], ShipComponent).state).toBe('disabled')
            expect(AppLog.getEntries().map(e => e.message)).toEqual(['Ship of player 2 disabled'])
        })

        it('should hand the turn on after a miss', () => {
            const phase = advanceAfterResolution(world, playing(2, 'firing'), 3, [{ kind: 'expired', missile: 10 }])
            expect(phase).toEqual(playing(0))
        })

        it('should skip a player eliminated by the shot', () => {
            const phase = advanceAfterResolution(world, playing(0, 'firing'), 3, [{ kind: 'hit', missile: 10, target: ships[1] }])
            expect(phase).toEqual(playing(2))
        })

        it('should end a two-player game when the opponent is hit', () => {
            world = new World()
            const a = spawnShip(world, transformAt(new Vec3(-5, 0, 0)), 0, disc(1))
            const b = spawnShip(world, transformAt(new Vec3(5, 0, 0)), 1, disc(1))

            const phase = advanceAfterResolution(world, playing(0, 'firing'), 2, [{ kind: 'hit', missile: 2, target: b }])

            expect(phase).toEqual({ kind: 'gameOver', winner: 0 })
            expect(world.requireComponent(a, ShipComponent).state).toBe('active')
            expect(AppLog.getEntries().map(e => e.message)).toEqual(['Ship of player 1 disabled', 'Game over: player 0 wins'])
        })

        it('should end without a winner when the shooter hits itself last', () => {
            world = new World()
            const a = spawnShip(world, transformAt(new Vec3(-5, 0, 0)), 0, disc(1))

            expect(advanceAfterResolution(world, playing(0, 'firing'), 1, [{ kind: 'hit', missile: 1, target: a }]))
                .toEqual({ kind: 'gameOver' })
            expect(AppLog.getEntries().map(e => e.message)).toContain('Game over: no survivors')
        })

        it('should leave phases outside play untouched', () => {
            const over: GamePhase = { kind: 'gameOver', winner: 1 }
            expect(advanceAfterResolution(world, over, 3, [{ kind: 'hit', missile: 1, target: ships[0] }])).toBe(over)
            expect(advanceAfterResolution(world, NOT_STARTED, 3, [])).toBe(NOT_STARTED)
            expect(world.requireComponent(ships[0], ShipComponent).state).toBe('active')
        })
    })
})
