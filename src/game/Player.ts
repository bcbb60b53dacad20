import type { Rgb } from '../lib/common.js'

export interface Player {
    readonly id: number
    readonly color: Readonly<Rgb>
}

/** Default player colours, linear RGB */
export const DEFAULT_PALETTE: readonly Readonly<Rgb>[] = [
    [0.9, 0.2, 0.2],
    [0.2, 0.45, 0.95],
    [0.2, 0.8, 0.3],
    [0.95, 0.8, 0.15],
    [0.7, 0.3, 0.9],
    [0.1, 0.8, 0.85],
    [0.95, 0.5, 0.1],
    [0.9, 0.9, 0.9]
]

/** Roster of `count` players, colours copied from the palette in order and reused when it runs out */
export function createPlayers(count: number, palette: readonly Readonly<Rgb>[] = DEFAULT_PALETTE): Player[] {
    if (palette.length === 0) {
        throw new Error('Palette is empty')
    }
    return Array.from({ length: count }, (_, id) => ({ id, color: copyRgb(palette[id % palette.length]) }))
}

function copyRgb([r, g, b]: Readonly<Rgb>): Readonly<Rgb> {
    return [r, g, b]
}
