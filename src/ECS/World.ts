import {
    type ComponentKey,
    type ComponentTypes,
    TransformComponent,
    Mass,
    CollisionShape,
    Renderer,
    MissileTrailComponent,
    ShipComponent
} from './Components.js'
import type { System } from './System.js'

export type EntityId = number

/**
 * Event types for entity lifecycle and missile outcomes
 */
export type WorldEvent =
    | 'entityCreated'
    | 'componentAdded'
    | 'componentRemoved'
    | 'missileHit'
    | 'missileExpired'

export interface WorldEventData {
    entityCreated: { entity: EntityId }
    componentAdded: { entity: EntityId; component: ComponentKey }
    componentRemoved: { entity: EntityId; component: ComponentKey }
    missileHit: { missile: EntityId; target: EntityId }
    missileExpired: { missile: EntityId }
}

type EventCallback<T extends WorldEvent> = (data: WorldEventData[T]) => void

type ComponentStorage = { [K in ComponentKey]: Map<EntityId, ComponentTypes[K]> }
type EventListeners = { [E in WorldEvent]: Set<EventCallback<E>> }

/**
 * Cached query result with dirty tracking
 */
interface QueryCache {
    entities: EntityId[]
    dirty: boolean
}

/**
 * Entity arena with per-component storage and query caching.
 *
 * Entities are plain integer ids handed out in increasing order and never
 * removed, so iteration order is creation order. A system updating one
 * entity reads the others through their ids instead of holding references
 * into shared storage.
 */
export class World {
    private nextEntityId: EntityId = 0
    private entityIds = new Set<EntityId>()
    private components: ComponentStorage = {
        [TransformComponent]: new Map(),
        [Mass]: new Map(),
        [CollisionShape]: new Map(),
        [Renderer]: new Map(),
        [MissileTrailComponent]: new Map(),
        [ShipComponent]: new Map()
    }

    // Query cache: key is sorted component names joined
    private queryCache = new Map<string, QueryCache>()

    private eventListeners: EventListeners = {
        entityCreated: new Set(),
        componentAdded: new Set(),
        componentRemoved: new Set(),
        missileHit: new Set(),
        missileExpired: new Set()
    }

    private simulationSystems: System[] = []
    private _tickCount = 0

    // ==================== Simulation ====================

    /**
     * Run every registered system once, in registration order.
     * Synchronous; returns only after the whole step has been applied.
     */
    step(dt: number): void {
        for (const system of this.simulationSystems) {
            system.update(this, dt)
        }
        this._tickCount++
    }

    get tickCount(): number {
        return this._tickCount
    }

    // ==================== Entity Management ====================

    createEntity(): EntityId {
        const id = this.nextEntityId++
        this.entityIds.add(id)
        this.invalidateAllCaches()
        this.emit('entityCreated', { entity: id })
        return id
    }

    getEntityCount(): number {
        return this.entityIds.size
    }

    /** All entities in creation order */
    entities(): EntityId[] {
        return Array.from(this.entityIds)
    }

    // ==================== Component Management ====================

    addComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K,
        value: ComponentTypes[K]
    ): void {
        if (!this.entityIds.has(entity)) {
            throw new Error(`Unknown entity: ${entity}`)
        }
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        const isNew = !storage.has(entity)
        storage.set(entity, value)

        if (isNew) {
            this.invalidateCachesForComponent(key)
            this.emit('componentAdded', { entity, component: key })
        }
    }

    removeComponent<K extends ComponentKey>(entity: EntityId, key: K): void {
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        if (storage.has(entity)) {
            storage.delete(entity)
            this.invalidateCachesForComponent(key)
            this.emit('componentRemoved', { entity, component: key })
        }
    }

    getComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K
    ): ComponentTypes[K] | undefined {
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        return storage.get(entity)
    }

    /**
     * Component that must exist for the entity to be well-formed.
     * A missing one is a programming error, not a game condition.
     */
    requireComponent<K extends ComponentKey>(entity: EntityId, key: K): ComponentTypes[K] {
        const value = this.getComponent(entity, key)
        if (value === undefined) {
            throw new Error(`Entity ${entity} has no ${key.description ?? 'component'}`)
        }
        return value
    }

    hasComponent<K extends ComponentKey>(entity: EntityId, key: K): boolean {
        return this.components[key].has(entity)
    }

    // ==================== Query Caching ====================

    private getCacheKey(keys: ComponentKey[]): string {
        // Sort by symbol description for consistent keys
        return keys.map(k => k.description ?? String(k)).sort().join('|')
    }

    private invalidateCachesForComponent(component: ComponentKey): void {
        const compName = component.description ?? String(component)
        for (const [key, cache] of this.queryCache) {
            if (key.split('|').includes(compName)) {
                cache.dirty = true
            }
        }
    }

    private invalidateAllCaches(): void {
        for (const cache of this.queryCache.values()) {
            cache.dirty = true
        }
    }

    // ==================== Queries ====================

    /**
     * Entities that have ALL specified components, in creation order.
     * Results are cached until one of the queried components is added or removed.
     */
    query(...keys: ComponentKey[]): EntityId[] {
        if (keys.length === 0) {
            return this.entities()
        }

        const cacheKey = this.getCacheKey(keys)
        const cache = this.queryCache.get(cacheKey)

        if (cache && !cache.dirty) {
            // Return a copy to prevent callers from corrupting the cache
            return cache.entities.slice()
        }

        const result = this.computeQuery(keys)

        if (cache) {
            cache.entities = result
            cache.dirty = false
        } else {
            this.queryCache.set(cacheKey, { entities: result, dirty: false })
        }

        return result.slice()
    }

    private computeQuery(keys: ComponentKey[]): EntityId[] {
        for (const key of keys) {
            if (this.components[key].size === 0) {
                return [] // No entities have this component
            }
        }

        // Walk the id set rather than the smallest storage so the result keeps creation order
        const result: EntityId[] = []
        for (const entity of this.entityIds) {
            if (keys.every(key => this.components[key].has(entity))) {
                result.push(entity)
            }
        }
        return result
    }

    // ==================== System Management ====================

    registerSystem(system: System): void {
        system.init?.(this)
        this.simulationSystems.push(system)
    }

    // ==================== Events ====================

    on<T extends WorldEvent>(event: T, callback: EventCallback<T>): () => void {
        const listeners: Set<EventCallback<T>> = this.eventListeners[event]
        listeners.add(callback)
        return () => this.off(event, callback)
    }

    off<T extends WorldEvent>(event: T, callback: EventCallback<T>): void {
        const listeners: Set<EventCallback<T>> = this.eventListeners[event]
        listeners.delete(callback)
    }

    emit<T extends WorldEvent>(event: T, data: WorldEventData[T]): void {
        const listeners: Set<EventCallback<T>> = this.eventListeners[event]
        for (const callback of listeners) {
            callback(data)
        }
    }
}
