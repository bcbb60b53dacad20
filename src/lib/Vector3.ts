// 3D vector for world positions, velocities and accelerations

import Vec2 from './Vector2.js'

export function vec3(v: IVec3): Vec3
export function vec3(x: number, y: number, z?: number): Vec3
export function vec3(xv: number | IVec3, y?: number, z?: number): Vec3 {
    if (typeof xv === 'object') {
        return new Vec3(xv.x, xv.y, xv.z)
    }
    return new Vec3(xv, y ?? xv, z ?? 0)
}

export interface IVec3 {
    x: number
    y: number
    z: number
}

export default class Vec3 implements IVec3 {
    constructor(
        public x: number,
        public y: number,
        public z: number
    ) {}

    set(x: number, y: number, z: number): Vec3
    set(v: IVec3): Vec3
    set(vx: IVec3 | number, y?: number, z?: number): Vec3 {
        if (typeof vx === 'object') {
            this.x = vx.x
            this.y = vx.y
            this.z = vx.z
        } else {
            this.x = vx
            this.y = y ?? vx
            this.z = z ?? vx
        }
        return this
    }

    copy(): Vec3 {
        return new Vec3(this.x, this.y, this.z)
    }

    add(v: IVec3): Vec3 {
        this.x += v.x
        this.y += v.y
        this.z += v.z
        return this
    }

    sub(v: IVec3): Vec3 {
        this.x -= v.x
        this.y -= v.y
        this.z -= v.z
        return this
    }

    scale(s: number): Vec3 {
        this.x *= s
        this.y *= s
        this.z *= s
        return this
    }

    normalize(): Vec3 {
        const l = this.len()
        if (l > 0) {
            this.scale(1 / l)
        }
        return this
    }

    len(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z)
    }

    lenSq(): number {
        return this.x * this.x + this.y * this.y + this.z * this.z
    }

    distanceTo(v: IVec3): number {
        const dx = this.x - v.x
        const dy = this.y - v.y
        const dz = this.z - v.z
        return Math.sqrt(dx * dx + dy * dy + dz * dz)
    }

    /** Projection onto the collision plane */
    xy(): Vec2 {
        return new Vec2(this.x, this.y)
    }

    equal(v: IVec3): boolean {
        return this.x === v.x && this.y === v.y && this.z === v.z
    }

    toString(): string {
        return `(${this.x}, ${this.y}, ${this.z})`
    }

    // ###################################################
    //    STATIC FUNCTIONS - always returns a new vector
    // ###################################################

    static copy(v: IVec3): Vec3 {
        return new Vec3(v.x, v.y, v.z)
    }

    static add(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(a.x + b.x, a.y + b.y, a.z + b.z)
    }

    static sub(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(a.x - b.x, a.y - b.y, a.z - b.z)
    }

    static scale(a: IVec3, s: number): Vec3 {
        return new Vec3(a.x * s, a.y * s, a.z * s)
    }

    static len(a: IVec3): number {
        return Math.sqrt(a.x * a.x + a.y * a.y + a.z * a.z)
    }

    static lenSq(a: IVec3): number {
        return a.x * a.x + a.y * a.y + a.z * a.z
    }

    // Zero stays zero: a body exerts no pull on its own centre
    static normalize(a: IVec3): Vec3 {
        const l = Vec3.len(a)
        if (l === 0) {
            return new Vec3(0, 0, 0)
        }
        return Vec3.scale(a, 1 / l)
    }

    static distance(a: IVec3, b: IVec3): number {
        return Vec3.len(Vec3.sub(b, a))
    }

    static dot(a: IVec3, b: IVec3): number {
        return a.x * b.x + a.y * b.y + a.z * b.z
    }

    static cross(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(
            a.y * b.z - a.z * b.y,
            a.z * b.x - a.x * b.z,
            a.x * b.y - a.y * b.x
        )
    }

    static zero(): Vec3 {
        return new Vec3(0, 0, 0)
    }
}
