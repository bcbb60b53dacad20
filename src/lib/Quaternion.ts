import Vec3, { type IVec3 } from './Vector3.js'

/**
 * Unit quaternion for entity orientation.
 * Only the constructors the game needs are provided; callers keep it normalized.
 */
export default class Quat {
    constructor(
        public w: number,
        public x: number,
        public y: number,
        public z: number
    ) {}

    static identity(): Quat {
        return new Quat(1, 0, 0, 0)
    }

    static fromAxisAngle(axis: IVec3, angle: number): Quat {
        const n = Vec3.normalize(axis)
        const half = angle / 2
        const s = Math.sin(half)
        return new Quat(Math.cos(half), n.x * s, n.y * s, n.z * s)
    }

    /** Rotation about the world Z axis, the axis normal to the play plane */
    static fromYaw(angle: number): Quat {
        return Quat.fromAxisAngle({ x: 0, y: 0, z: 1 }, angle)
    }

    multiply(q: Quat): Quat {
        return new Quat(
            this.w * q.w - this.x * q.x - this.y * q.y - this.z * q.z,
            this.w * q.x + this.x * q.w + this.y * q.z - this.z * q.y,
            this.w * q.y - this.x * q.z + this.y * q.w + this.z * q.x,
            this.w * q.z + this.x * q.y - this.y * q.x + this.z * q.w
        )
    }

    /** Rotate a vector: v' = v + 2w(u x v) + 2u x (u x v) */
    rotate(v: IVec3): Vec3 {
        const u = new Vec3(this.x, this.y, this.z)
        const t = Vec3.cross(u, v).scale(2)
        return Vec3.copy(v).add(Vec3.scale(t, this.w)).add(Vec3.cross(u, t))
    }

    copy(): Quat {
        return new Quat(this.w, this.x, this.y, this.z)
    }
}
