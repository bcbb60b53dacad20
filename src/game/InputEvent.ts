export interface FireParams {
    /** Radians, counter-clockwise from +X */
    angle: number
    /** Speed units, 0..missileMaxVelocity */
    speed: number
}

export type InputEvent =
    | { kind: 'panCamera'; dx: number; dy: number }
    | { kind: 'zoomCamera'; factor: number }
    | ({ kind: 'fireMissile' } & FireParams)
