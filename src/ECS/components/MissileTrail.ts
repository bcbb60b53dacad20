import Vec3 from '../../lib/Vector3.js'

/**
 * Flight record of one missile.
 * Positions are append-only; `dataVersion` lets renderers skip re-uploading
 * an unchanged trail.
 */
export class MissileTrail {
    private readonly _positions: Vec3[]
    private _dataVersion = 0

    constructor(
        readonly playerId: number,
        start: Vec3,
        public velocity: Vec3,
        /** Seconds remaining; at or below zero the trail is terminal */
        public timeToLive: number
    ) {
        this._positions = [start.copy()]
    }

    get positions(): readonly Vec3[] {
        return this._positions
    }

    get dataVersion(): number {
        return this._dataVersion
    }

    get head(): Vec3 {
        return this._positions[this._positions.length - 1]
    }

    get isLive(): boolean {
        return this.timeToLive > 0
    }

    addPosition(position: Vec3): void {
        this._dataVersion++
        this._positions.push(position)
    }
}
