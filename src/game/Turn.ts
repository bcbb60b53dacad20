import { AppLog } from '../AppLog.js'
import { ShipComponent } from '../ECS/Components.js'
import { disableShip } from '../ECS/components/Ship.js'
import type { MissileEvent } from '../ECS/systems/MissileSystem.js'
import type { World } from '../ECS/World.js'

export type TurnState = 'aiming' | 'firing'

export interface Turn {
    currentPlayer: number
    state: TurnState
}

export type GamePhase =
    | { kind: 'notStarted' }
    | { kind: 'playing'; turn: Turn }
    /** `winner` is set when exactly one player was left standing */
    | { kind: 'gameOver'; winner?: number }

export const NOT_STARTED: GamePhase = { kind: 'notStarted' }

export function playing(currentPlayer: number, state: TurnState = 'aiming'): GamePhase {
    return { kind: 'playing', turn: { currentPlayer, state } }
}

export function currentTurn(phase: GamePhase): Turn | undefined {
    return phase.kind === 'playing' ? phase.turn : undefined
}

/**
 * Players that still have an active ship.
 * Elimination is never stored; it is read off the ships every time.
 */
export function activePlayers(world: World): Set<number> {
    const players = new Set<number>()
    for (const id of world.query(ShipComponent)) {
        const ship = world.requireComponent(id, ShipComponent)
        if (ship.state === 'active') {
            players.add(ship.playerId)
        }
    }
    return players
}

function gameOver(remaining: Iterable<number>, playerCount: number): GamePhase {
    const survivors = [...remaining].filter(p => p >= 0 && p < playerCount)
    return survivors.length === 1 ? { kind: 'gameOver', winner: survivors[0] } : { kind: 'gameOver' }
}

/**
 * First turn: the lowest-indexed player with an active ship aims.
 */
export function firstPhase(playerCount: number, remaining: ReadonlySet<number>): GamePhase {
    for (let p = 0; p < playerCount; p++) {
        if (remaining.has(p)) {
            return playing(p)
        }
    }
    return gameOver(remaining, playerCount)
}

/**
 * Phase after `turn` resolves: the first player strictly after the current
 * one (wrapping) with an active ship. Wrapping all the way back to the
 * current player means nobody else is left, which ends the game.
 */
export function nextPhase(turn: Turn, playerCount: number, remaining: ReadonlySet<number>): GamePhase {
    if (playerCount === 0) {
        return { kind: 'gameOver' }
    }

    for (let step = 1; step < playerCount; step++) {
        const candidate = (turn.currentPlayer + step) % playerCount
        if (remaining.has(candidate)) {
            return playing(candidate)
        }
    }
    return gameOver(remaining, playerCount)
}

/**
 * Start from `notStarted`. Any other phase is returned unchanged.
 */
export function startGame(world: World, phase: GamePhase, playerCount: number): GamePhase {
    if (phase.kind !== 'notStarted') {
        AppLog.warn(`Game already ${phase.kind === 'playing' ? 'in progress' : 'over'}`)
        return phase
    }

    const next = firstPhase(playerCount, activePlayers(world))
    logPhase(next)
    return next
}

/**
 * Apply missile outcomes to the world: a hit ship is disabled, everything
 * else is left alone. Returns the ships that were disabled.
 */
export function applyMissileEvents(world: World, events: readonly MissileEvent[]): number[] {
    const disabled: number[] = []
    for (const event of events) {
        if (event.kind !== 'hit') continue

        const ship = world.getComponent(event.target, ShipComponent)
        if (ship && disableShip(ship)) {
            disabled.push(event.target)
            AppLog.info(`Ship of player ${ship.playerId} disabled`)
        }
    }
    return disabled
}

/**
 * Resolve a firing turn: apply its missile events, then hand over to the next
 * eligible player or end the game. Outside `playing` nothing changes.
 */
export function advanceAfterResolution(
    world: World,
    phase: GamePhase,
    playerCount: number,
    events: readonly MissileEvent[]
): GamePhase {
    if (phase.kind !== 'playing') {
        return phase
    }

    applyMissileEvents(world, events)
    const next = nextPhase(phase.turn, playerCount, activePlayers(world))
    logPhase(next)
    return next
}

function logPhase(phase: GamePhase): void {
    if (phase.kind === 'playing') {
        AppLog.info(`Player ${phase.turn.currentPlayer} to aim`)
    } else if (phase.kind === 'gameOver') {
        AppLog.info(phase.winner === undefined ? 'Game over: no survivors' : `Game over: player ${phase.winner} wins`)
    }
}
