import Vec3 from '../../lib/Vector3.js'
import Quat from '../../lib/Quaternion.js'
import { type Isometry } from '../geometry/Shape.js'

export interface Transform {
    position: Vec3
    rotation: Quat
    /** Uniform render scale; collision shapes are not scaled */
    scale: number
}

export function transformAt(position: Vec3, rotation: Quat = Quat.identity(), scale: number = 1): Transform {
    return { position, rotation, scale }
}

/**
 * Rough mapping of the 3D transform onto the collision plane: translation is
 * the XY position, rotation is the heading of the rotated X axis.
 */
export function collisionTransform(transform: Transform): Isometry {
    const heading = transform.rotation.rotate({ x: 1, y: 0, z: 0 })
    const len = Math.hypot(heading.x, heading.y)
    const translation = transform.position.xy()
    // X axis rotated onto Z (up to rounding): no usable heading in the plane
    if (len < 1e-9) {
        return { translation, cos: 1, sin: 0 }
    }
    return { translation, cos: heading.x / len, sin: heading.y / len }
}
