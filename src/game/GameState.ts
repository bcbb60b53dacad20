import { AppLog } from '../AppLog.js'
import type { EntityRenderer } from '../ECS/Components.js'
import { createGameConfig, type GameConfig } from '../ECS/GameConfig.js'
import { createMissileSystem, hasLiveMissiles, type MissileEvent } from '../ECS/systems/MissileSystem.js'
import type { World } from '../ECS/World.js'
import { Camera } from './Camera.js'
import { fireMissile, type FireErrorCode, type FireResult } from './FireCommand.js'
import type { FireParams, InputEvent } from './InputEvent.js'
import { defaultLighting, type Lighting } from './Light.js'
import { generateMap, type MapGenErrorCode, type MapGenOptions } from './MapGenerator.js'
import type { Player } from './Player.js'
import { NOT_STARTED, advanceAfterResolution, startGame, type GamePhase } from './Turn.js'

export interface GameStateOptions extends Omit<MapGenOptions, 'config'> {
    config?: Partial<GameConfig>
    /** Fresh generations to try before giving up (default 1) */
    generationAttempts?: number
    missileRenderer?: (playerId: number) => EntityRenderer
}

export type CreateGameResult =
    | { ok: true; state: GameState }
    | { ok: false; code: MapGenErrorCode; reason: string }

export interface TickReport {
    /** Missile outcomes produced by this tick */
    events: MissileEvent[]
    /** Fire commands from the input queue that were refused */
    rejected: { code: FireErrorCode; reason: string }[]
    /** Phase after the tick */
    phase: GamePhase
}

/**
 * Everything one game owns: the world, the roster, the phase and the
 * render-facing camera and lighting.
 *
 * All methods are synchronous and run to completion; the host drives `tick`
 * at `config.tickInterval`.
 */
export class GameState {
    readonly camera = new Camera()
    light: Lighting = defaultLighting()

    private _phase: GamePhase = NOT_STARTED
    private inputQueue: InputEvent[] = []
    // Missile outcomes of the turn currently being resolved
    private turnEvents: MissileEvent[] = []

    constructor(
        readonly world: World,
        readonly players: readonly Player[],
        readonly config: GameConfig,
        private readonly missileRenderer?: (playerId: number) => EntityRenderer
    ) {
        world.registerSystem(createMissileSystem(config))
        world.on('missileHit', ({ missile, target }) => {
            AppLog.info(`Missile ${missile} hit entity ${target}`)
            this.turnEvents.push({ kind: 'hit', missile, target })
        })
        world.on('missileExpired', ({ missile }) => {
            AppLog.info(`Missile ${missile} expired`)
            this.turnEvents.push({ kind: 'expired', missile })
        })
    }

    /**
     * Generate a map and wrap it. Each failed attempt draws fresh positions
     * from the same random source.
     */
    static create(options: GameStateOptions): CreateGameResult {
        const config = createGameConfig(options.config)
        const attempts = Math.max(1, options.generationAttempts ?? 1)

        let failure: CreateGameResult = { ok: false, code: 'PLACEMENT_FAILED', reason: 'map generation not attempted' }
        for (let attempt = 1; attempt <= attempts; attempt++) {
            const result = generateMap({ ...options, config })
            if (result.ok) {
                return { ok: true, state: new GameState(result.world, result.players, config, options.missileRenderer) }
            }
            failure = result
            // Bad arguments will not get better with new randomness
            if (result.code !== 'PLACEMENT_FAILED') break
            AppLog.warn(`Map generation attempt ${attempt}/${attempts} failed`)
        }
        if (!failure.ok) {
            AppLog.error(`Could not create game: ${failure.reason}`)
        }
        return failure
    }

    get phase(): GamePhase {
        return this._phase
    }

    start(): GamePhase {
        this._phase = startGame(this.world, this._phase, this.players.length)
        return this._phase
    }

    fire(params: FireParams): FireResult {
        const result = fireMissile(
            { world: this.world, phase: this._phase, config: this.config, missileRenderer: this.missileRenderer },
            params
        )
        if (result.ok) {
            this._phase = result.phase
        }
        return result
    }

    pushInput(event: InputEvent): void {
        this.inputQueue.push(event)
    }

    /**
     * One simulation step: apply queued input, advance missiles, and hand the
     * turn over once the last missile of a firing turn has come down.
     */
    tick(): TickReport {
        const rejected: TickReport['rejected'] = []
        const queued = this.inputQueue
        this.inputQueue = []

        for (const input of queued) {
            switch (input.kind) {
                case 'panCamera':
                    this.camera.pan(input.dx, input.dy)
                    break
                case 'zoomCamera':
                    this.camera.zoom(input.factor)
                    break
                case 'fireMissile': {
                    const result = this.fire({ angle: input.angle, speed: input.speed })
                    if (!result.ok) {
                        rejected.push({ code: result.code, reason: result.reason })
                    }
                    break
                }
            }
        }

        const seen = this.turnEvents.length
        this.world.step(this.config.tickInterval)
        const events = this.turnEvents.slice(seen)

        if (this._phase.kind === 'playing'
            && this._phase.turn.state === 'firing'
            && !hasLiveMissiles(this.world)) {
            this._phase = advanceAfterResolution(this.world, this._phase, this.players.length, this.turnEvents)
            this.turnEvents = []
        }

        return { events, rejected, phase: this._phase }
    }
}
