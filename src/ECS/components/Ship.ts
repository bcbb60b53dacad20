export type ShipState = 'active' | 'disabled'

export interface Ship {
    readonly playerId: number
    state: ShipState
}

export function createShip(playerId: number): Ship {
    return { playerId, state: 'active' }
}

/** Disabled is terminal */
export function disableShip(ship: Ship): boolean {
    if (ship.state === 'disabled') return false
    ship.state = 'disabled'
    return true
}
