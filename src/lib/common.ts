export function clamp(x: number, min: number, max: number): number
{
    return Math.min(Math.max(x, min), max)
}

/** Linear RGB triple, each channel 0..1 */
export type Rgb = [number, number, number]

export function color(rgb: Readonly<Rgb>): string
{
    const [r, g, b] = rgb.map(c => Math.round(clamp(c, 0, 1) * 255))
    return `rgb(${r},${g},${b})`
}
