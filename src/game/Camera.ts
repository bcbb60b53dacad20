import Vec2 from '../lib/Vector2.js'

export interface OrthoBounds {
    left: number
    right: number
    top: number
    bottom: number
    near: number
    far: number
}

/**
 * 2D camera over the play plane. Render-facing only; the simulation never reads it.
 * Zoom is kept on a log10 scale so repeated zooming is symmetric.
 */
export class Camera {
    position = Vec2.zero()
    logScale = 0

    /** Half the visible height in world units */
    scale(): number {
        return Math.pow(10, this.logScale)
    }

    pan(dx: number, dy: number): void {
        if (!Number.isFinite(dx) || !Number.isFinite(dy)) return
        this.position.add({ x: dx, y: dy })
    }

    /** factor > 1 zooms in */
    zoom(factor: number): void {
        if (!(factor > 0) || !Number.isFinite(factor)) return
        this.logScale -= Math.log10(factor)
    }

    projection(aspectRatio: number): OrthoBounds {
        const scale = this.scale()
        const halfWidth = scale * aspectRatio
        return {
            left: this.position.x - halfWidth,
            right: this.position.x + halfWidth,
            top: this.position.y + scale,
            bottom: this.position.y - scale,
            near: -scale,
            far: scale
        }
    }
}
