// Core ECS exports
export { World } from './World.js'
export type { EntityId, WorldEvent, WorldEventData } from './World.js'
export { createSystem } from './System.js'
export type { System } from './System.js'

// Components
export {
    TransformComponent,
    Mass,
    CollisionShape,
    Renderer,
    MissileTrailComponent,
    ShipComponent
} from './Components.js'
export type { ComponentTypes, ComponentKey, EntityRenderer } from './Components.js'
export { MissileTrail } from './components/MissileTrail.js'
export { createShip, disableShip } from './components/Ship.js'
export type { Ship, ShipState } from './components/Ship.js'
export { transformAt, collisionTransform } from './components/Transform.js'
export type { Transform } from './components/Transform.js'

// Entities and gravity
export { spawnPlanet, spawnShip, spawnMissile, gravitationalAcceleration, gravityAt } from './Entities.js'

// Geometry
export {
    disc,
    polyline,
    cloneShape,
    isometry,
    isClosed,
    boundingRadius,
    timeOfImpact,
    proximity,
    polylineFromMesh
} from './geometry/Shape.js'
export type { Shape, Disc, Polyline, Proximity, Isometry } from './geometry/Shape.js'

// Configuration
export { DEFAULT_GAME_CONFIG, createGameConfig, planetMass } from './GameConfig.js'
export type { GameConfig } from './GameConfig.js'

// Systems
export { createMissileSystem, updateMissileTrail, timeToCollision, hasLiveMissiles } from './systems/MissileSystem.js'
export type { MissileEvent } from './systems/MissileSystem.js'
