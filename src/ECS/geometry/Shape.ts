import Vec2, { type IVec2 } from '../../lib/Vector2.js'
import type { IVec3 } from '../../lib/Vector3.js'

/**
 * Collision shapes live in the XY plane.
 * A disc is used for planets and simple ships, a polyline for detailed hulls.
 */
export interface Disc {
    kind: 'disc'
    radius: number
}

/**
 * Chain of segments in entity-local coordinates.
 * When the last point equals the first the contour is closed and has an interior.
 */
export interface Polyline {
    kind: 'polyline'
    points: readonly Vec2[]
}

export type Shape = Disc | Polyline

export type Proximity = 'disjoint' | 'intersecting' | 'withinMargin'

/** Rigid 2D placement of a shape: rotate, then translate */
export interface Isometry {
    translation: Vec2
    cos: number
    sin: number
}

export function disc(radius: number): Disc {
    return { kind: 'disc', radius }
}

export function polyline(points: readonly IVec2[]): Polyline {
    return { kind: 'polyline', points: points.map(p => new Vec2(p.x, p.y)) }
}

/** Independent copy, for shapes owned by a single entity */
export function cloneShape(shape: Shape): Shape {
    return shape.kind === 'disc' ? disc(shape.radius) : polyline(shape.points)
}

export function isometry(x: number, y: number, angle: number = 0): Isometry {
    return { translation: new Vec2(x, y), cos: Math.cos(angle), sin: Math.sin(angle) }
}

export function isClosed(line: Polyline): boolean {
    const pts = line.points
    return pts.length > 3 && pts[0].equal(pts[pts.length - 1])
}

function toWorld(p: IVec2, iso: Isometry): Vec2 {
    return Vec2.rotate(p, iso.cos, iso.sin).add(iso.translation)
}

function toLocal(p: IVec2, iso: Isometry): Vec2 {
    return Vec2.rotate(Vec2.sub(p, iso.translation), iso.cos, -iso.sin)
}

/** Radius of the smallest origin-centred circle enclosing the shape */
export function boundingRadius(shape: Shape): number {
    switch (shape.kind) {
        case 'disc':
            return shape.radius
        case 'polyline': {
            let r = 0
            for (const p of shape.points) {
                r = Math.max(r, p.len())
            }
            return r
        }
    }
}

// ==================== Ray casts ====================

/**
 * Earliest t in [0, maxTime] where origin + direction * t touches the shape.
 * With `solid`, a ray starting inside the shape hits at t = 0; otherwise it
 * reports where it leaves the interior (discs) or crosses the contour.
 */
export function timeOfImpact(
    shape: Shape,
    iso: Isometry,
    origin: IVec2,
    direction: IVec2,
    maxTime: number,
    solid: boolean
): number | undefined {
    const toi = shape.kind === 'disc'
        ? discTimeOfImpact(shape, iso, origin, direction, solid)
        : polylineTimeOfImpact(shape, iso, origin, direction, solid)
    return toi !== undefined && toi <= maxTime ? toi : undefined
}

function discTimeOfImpact(
    shape: Disc,
    iso: Isometry,
    origin: IVec2,
    direction: IVec2,
    solid: boolean
): number | undefined {
    const rel = Vec2.sub(origin, iso.translation)
    const c = Vec2.dot(rel, rel) - shape.radius * shape.radius
    const a = Vec2.dot(direction, direction)

    if (c <= 0 && solid) return 0
    if (a === 0) return undefined

    const b = 2 * Vec2.dot(direction, rel)
    const discriminant = b * b - 4 * a * c
    if (discriminant < 0) return undefined

    const sqrtD = Math.sqrt(discriminant)
    // Inside: the exit point is the only hit ahead
    const t = c <= 0 ? (-b + sqrtD) / (2 * a) : (-b - sqrtD) / (2 * a)
    return t >= 0 ? t : undefined
}

function polylineTimeOfImpact(
    shape: Polyline,
    iso: Isometry,
    origin: IVec2,
    direction: IVec2,
    solid: boolean
): number | undefined {
    const o = toLocal(origin, iso)
    const d = Vec2.rotate(direction, iso.cos, -iso.sin)

    if (solid && isClosed(shape) && containsPoint(shape.points, o)) return 0

    let best: number | undefined
    for (let i = 0; i + 1 < shape.points.length; i++) {
        const t = raySegment(o, d, shape.points[i], shape.points[i + 1])
        if (t !== undefined && (best === undefined || t < best)) {
            best = t
        }
    }
    return best
}

function raySegment(o: IVec2, d: IVec2, a: IVec2, b: IVec2): number | undefined {
    const e = Vec2.sub(b, a)
    const w = Vec2.sub(a, o)
    const denom = Vec2.cross(d, e)

    if (denom === 0) {
        // Parallel: only a collinear overlap can be hit
        if (Vec2.cross(w, d) !== 0) return undefined
        const dd = Vec2.dot(d, d)
        if (dd === 0) {
            return pointSegmentDistance(o, a, b) === 0 ? 0 : undefined
        }
        const t0 = Vec2.dot(w, d) / dd
        const t1 = Vec2.dot(Vec2.sub(b, o), d) / dd
        if (Math.max(t0, t1) < 0) return undefined
        return Math.max(0, Math.min(t0, t1))
    }

    const t = Vec2.cross(w, e) / denom
    const s = Vec2.cross(w, d) / denom
    return t >= 0 && s >= 0 && s <= 1 ? t : undefined
}

// ==================== Proximity ====================

/**
 * Classify how two placed shapes relate.
 * Touching counts as intersecting; a gap no wider than `margin` is withinMargin.
 */
export function proximity(
    a: Shape,
    isoA: Isometry,
    b: Shape,
    isoB: Isometry,
    margin: number
): Proximity {
    const d = separation(a, isoA, b, isoB)
    if (d <= 0) return 'intersecting'
    if (d <= margin) return 'withinMargin'
    return 'disjoint'
}

/** Gap between two shapes; zero or negative when they overlap */
function separation(a: Shape, isoA: Isometry, b: Shape, isoB: Isometry): number {
    if (a.kind === 'disc' && b.kind === 'disc') {
        return Vec2.distance(isoA.translation, isoB.translation) - a.radius - b.radius
    }
    if (a.kind === 'disc' && b.kind === 'polyline') {
        return discPolylineSeparation(a, isoA, b, isoB)
    }
    if (a.kind === 'polyline' && b.kind === 'disc') {
        return discPolylineSeparation(b, isoB, a, isoA)
    }
    if (a.kind === 'polyline' && b.kind === 'polyline') {
        return polylineSeparation(a, isoA, b, isoB)
    }
    throw new Error(`Unsupported shape pair: ${a.kind}/${b.kind}`)
}

function discPolylineSeparation(d: Disc, isoD: Isometry, line: Polyline, isoL: Isometry): number {
    const centre = toLocal(isoD.translation, isoL)
    if (isClosed(line) && containsPoint(line.points, centre)) return -d.radius

    return distanceToChain(centre, line.points) - d.radius
}

function polylineSeparation(a: Polyline, isoA: Isometry, b: Polyline, isoB: Isometry): number {
    const pa = a.points.map(p => toWorld(p, isoA))
    const pb = b.points.map(p => toWorld(p, isoB))

    if (isClosed(a) && pb.some(p => containsPoint(pa, p))) return 0
    if (isClosed(b) && pa.some(p => containsPoint(pb, p))) return 0

    if (pa.length === 1 || pb.length === 1) {
        const [point, chain] = pa.length === 1 ? [pa[0], pb] : [pb[0], pa]
        return distanceToChain(point, chain)
    }

    let best = Infinity
    for (let i = 0; i + 1 < pa.length; i++) {
        for (let j = 0; j + 1 < pb.length; j++) {
            best = Math.min(best, segmentDistance(pa[i], pa[i + 1], pb[j], pb[j + 1]))
            if (best === 0) return 0
        }
    }
    return best
}

function distanceToChain(p: IVec2, chain: readonly IVec2[]): number {
    if (chain.length === 1) return Vec2.distance(p, chain[0])

    let best = Infinity
    for (let i = 0; i + 1 < chain.length; i++) {
        best = Math.min(best, pointSegmentDistance(p, chain[i], chain[i + 1]))
    }
    return best
}

function pointSegmentDistance(p: IVec2, a: IVec2, b: IVec2): number {
    const e = Vec2.sub(b, a)
    const lenSq = Vec2.dot(e, e)
    if (lenSq === 0) return Vec2.distance(p, a)

    const t = Math.max(0, Math.min(1, Vec2.dot(Vec2.sub(p, a), e) / lenSq))
    return Vec2.distance(p, Vec2.add(a, Vec2.scale(e, t)))
}

function segmentDistance(a: IVec2, b: IVec2, c: IVec2, d: IVec2): number {
    if (segmentsIntersect(a, b, c, d)) return 0
    return Math.min(
        pointSegmentDistance(a, c, d),
        pointSegmentDistance(b, c, d),
        pointSegmentDistance(c, a, b),
        pointSegmentDistance(d, a, b)
    )
}

function orientation(a: IVec2, b: IVec2, c: IVec2): number {
    return Math.sign(Vec2.cross(Vec2.sub(b, a), Vec2.sub(c, a)))
}

function onSegment(a: IVec2, b: IVec2, p: IVec2): boolean {
    return p.x >= Math.min(a.x, b.x) && p.x <= Math.max(a.x, b.x)
        && p.y >= Math.min(a.y, b.y) && p.y <= Math.max(a.y, b.y)
}

function segmentsIntersect(a: IVec2, b: IVec2, c: IVec2, d: IVec2): boolean {
    const o1 = orientation(a, b, c)
    const o2 = orientation(a, b, d)
    const o3 = orientation(c, d, a)
    const o4 = orientation(c, d, b)

    if (o1 !== o2 && o3 !== o4) return true

    return (o1 === 0 && onSegment(a, b, c))
        || (o2 === 0 && onSegment(a, b, d))
        || (o3 === 0 && onSegment(c, d, a))
        || (o4 === 0 && onSegment(c, d, b))
}

/** Even-odd test against a closed contour */
function containsPoint(contour: readonly IVec2[], p: IVec2): boolean {
    let inside = false
    for (let i = 0, j = contour.length - 1; i < contour.length; j = i++) {
        const a = contour[i]
        const b = contour[j]
        if ((a.y > p.y) !== (b.y > p.y)
            && p.x < ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x) {
            inside = !inside
        }
    }
    return inside
}

// ==================== Mesh contours ====================

/**
 * Collision contour for a mesh-derived hull: the convex hull of the vertices
 * projected onto XY, closed.
 */
export function polylineFromMesh(vertices: readonly IVec3[]): Polyline {
    const pts = vertices
        .map(v => new Vec2(v.x, v.y))
        .sort((p, q) => p.x - q.x || p.y - q.y)

    const lower: Vec2[] = []
    for (const p of pts) {
        while (lower.length >= 2 && orientation(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) {
            lower.pop()
        }
        lower.push(p)
    }
    const upper: Vec2[] = []
    for (let i = pts.length - 1; i >= 0; i--) {
        const p = pts[i]
        while (upper.length >= 2 && orientation(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) {
            upper.pop()
        }
        upper.push(p)
    }

    const hull = lower.slice(0, -1).concat(upper.slice(0, -1))
    if (hull.length < 3) {
        throw new Error(`Mesh has no area in the XY plane (${vertices.length} vertices)`)
    }
    return { kind: 'polyline', points: [...hull, hull[0].copy()] }
}
