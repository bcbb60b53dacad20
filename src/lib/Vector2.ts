// 2D vector for the collision plane (world XY)

export interface IVec2 {
    x: number
    y: number
}

export function vec2(x: number, y: number): Vec2 {
    return new Vec2(x, y)
}

export default class Vec2 implements IVec2 {
    constructor(
        public x: number,
        public y: number
    ) {}

    copy(): Vec2 {
        return new Vec2(this.x, this.y)
    }

    add(v: IVec2): Vec2 {
        this.x += v.x
        this.y += v.y
        return this
    }

    sub(v: IVec2): Vec2 {
        this.x -= v.x
        this.y -= v.y
        return this
    }

    scale(s: number): Vec2 {
        this.x *= s
        this.y *= s
        return this
    }

    len(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y)
    }

    lenSq(): number {
        return this.x * this.x + this.y * this.y
    }

    equal(v: IVec2): boolean {
        return this.x === v.x && this.y === v.y
    }

    toString(): string {
        return `(${this.x}, ${this.y})`
    }

    // ###################################################
    //    STATIC FUNCTIONS - always returns a new vector
    // ###################################################

    static add(a: IVec2, b: IVec2): Vec2 {
        return new Vec2(a.x + b.x, a.y + b.y)
    }

    static sub(a: IVec2, b: IVec2): Vec2 {
        return new Vec2(a.x - b.x, a.y - b.y)
    }

    static scale(a: IVec2, s: number): Vec2 {
        return new Vec2(a.x * s, a.y * s)
    }

    static dot(a: IVec2, b: IVec2): number {
        return a.x * b.x + a.y * b.y
    }

    /** z component of the 3D cross product */
    static cross(a: IVec2, b: IVec2): number {
        return a.x * b.y - a.y * b.x
    }

    static len(a: IVec2): number {
        return Math.sqrt(a.x * a.x + a.y * a.y)
    }

    static distance(a: IVec2, b: IVec2): number {
        return Vec2.len(Vec2.sub(b, a))
    }

    static rotate(a: IVec2, cos: number, sin: number): Vec2 {
        return new Vec2(a.x * cos - a.y * sin, a.x * sin + a.y * cos)
    }

    static zero(): Vec2 {
        return new Vec2(0, 0)
    }
}
