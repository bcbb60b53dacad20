export * from './ECS/index.js'

export { AppLog, Logger } from './AppLog.js'
export type { LogEntry, LogLevel } from './AppLog.js'

export { default as Vec3, vec3 } from './lib/Vector3.js'
export type { IVec3 } from './lib/Vector3.js'
export { default as Vec2, vec2 } from './lib/Vector2.js'
export type { IVec2 } from './lib/Vector2.js'
export { default as Quat } from './lib/Quaternion.js'
export { SeededRandom } from './lib/Random.js'
export type { Random } from './lib/Random.js'
export { color } from './lib/common.js'
export type { Rgb } from './lib/common.js'

export { GameState } from './game/GameState.js'
export type { GameStateOptions, CreateGameResult, TickReport } from './game/GameState.js'
export {
    NOT_STARTED,
    playing,
    currentTurn,
    activePlayers,
    firstPhase,
    nextPhase,
    startGame,
    applyMissileEvents,
    advanceAfterResolution
} from './game/Turn.js'
export type { GamePhase, Turn, TurnState } from './game/Turn.js'
export { fireMissile, findActiveShip, clearLauncher } from './game/FireCommand.js'
export type { FireContext, FireResult, FireErrorCode } from './game/FireCommand.js'
export { generateMap, placeEntity, samplePlanetCount } from './game/MapGenerator.js'
export type { Arena, MapGenOptions, MapGenResult, MapGenErrorCode, PlacementResult } from './game/MapGenerator.js'
export { createPlayers, DEFAULT_PALETTE } from './game/Player.js'
export type { Player } from './game/Player.js'
export { Camera } from './game/Camera.js'
export type { OrthoBounds } from './game/Camera.js'
export { defaultLighting } from './game/Light.js'
export type { Lighting, SunLight } from './game/Light.js'
export type { InputEvent, FireParams } from './game/InputEvent.js'
