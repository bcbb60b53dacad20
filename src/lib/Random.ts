/**
 * Randomness source for map generation.
 * Anything that draws from the world (planet counts, sizes, positions) goes
 * through this interface so tests can pin the sequence.
 */
export interface Random {
    /** Uniform sample in [min, max) */
    uniform(min: number, max: number): number
    /** Normally distributed sample */
    normal(mean: number, stdDev: number): number
}

/**
 * Seeded PRNG (mulberry32) with Box-Muller normal sampling.
 * Same seed, same sequence.
 */
export class SeededRandom implements Random {
    private state: number

    constructor(seed: number) {
        this.state = (seed >>> 0) || 0x12345678
    }

    /** Uniform in [0, 1) */
    next(): number {
        this.state = (this.state + 0x6d2b79f5) | 0
        let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }

    uniform(min: number, max: number): number {
        return min + (max - min) * this.next()
    }

    normal(mean: number, stdDev: number): number {
        // 1 - next() keeps u1 in (0, 1] so the log is finite
        const u1 = 1 - this.next()
        const u2 = this.next()
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
        return mean + z * stdDev
    }
}
