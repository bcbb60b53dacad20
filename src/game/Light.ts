import Vec3 from '../lib/Vector3.js'
import type { Rgb } from '../lib/common.js'

export interface SunLight {
    /** Direction the light travels, unit length */
    direction: Vec3
    color: Rgb
}

/** Scene lighting handed through to the renderer */
export interface Lighting {
    sun: SunLight
    ambient: Rgb
}

export function defaultLighting(): Lighting {
    return {
        sun: {
            direction: Vec3.normalize({ x: -1, y: -1, z: -1 }),
            color: [1, 1, 1]
        },
        ambient: [0.15, 0.15, 0.2]
    }
}
