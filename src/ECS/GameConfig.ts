/**
 * Game constants and tuning.
 * Passed explicitly into the integrator, fire command and map generator so
 * tests can run with alternate values.
 */
export interface GameConfig {
    /** Game state ticks per second */
    readonly ticksPerSecond: number
    /** Tick interval (seconds), always 1 / ticksPerSecond */
    readonly tickInterval: number

    /** Gravitational constant (gameplay units, not SI) */
    readonly gravitationalConstant: number

    /** Missile lifetime (seconds) */
    readonly missileTimeToLive: number
    /** Maximum fire speed (speed units) */
    readonly missileMaxVelocity: number
    /** World units per second per speed unit */
    readonly missileVelocityScale: number
    /** Step length of the spawn walk out of the launcher (world units) */
    readonly spawnStep: number

    /** Planets per square world unit */
    readonly planetDensityMean: number
    readonly planetDensityStdDev: number
    readonly planetRadiusMean: number
    readonly planetRadiusStdDev: number
    readonly planetRadiusMin: number
    /** Material density used for planet mass */
    readonly planetMaterialDensityMean: number
    readonly planetMaterialDensityStdDev: number

    /** Radius of the default disc hull */
    readonly shipRadius: number
    readonly maxPlacementAttempts: number
    /** Margin handed to the proximity test during placement */
    readonly proximityMargin: number
}

const TICKS_PER_SECOND = 30

export const DEFAULT_GAME_CONFIG: GameConfig = {
    ticksPerSecond: TICKS_PER_SECOND,
    tickInterval: 1 / TICKS_PER_SECOND,

    gravitationalConstant: 5e-10,

    missileTimeToLive: 30,
    missileMaxVelocity: 10,
    missileVelocityScale: 10,
    spawnStep: 0.05,

    planetDensityMean: 0.0015,
    planetDensityStdDev: 0.0005,
    planetRadiusMean: 4,
    planetRadiusStdDev: 1.5,
    planetRadiusMin: 1,
    planetMaterialDensityMean: 1000,
    planetMaterialDensityStdDev: 300,

    shipRadius: 1,
    maxPlacementAttempts: 100,
    proximityMargin: Number.EPSILON
}

/**
 * Merge overrides into the defaults. Keys given as `undefined` keep their default.
 * `tickInterval` follows `ticksPerSecond` unless given explicitly.
 */
export function createGameConfig(overrides: Partial<GameConfig> = {}): GameConfig {
    const pick = (key: keyof GameConfig): number => overrides[key] ?? DEFAULT_GAME_CONFIG[key]

    const ticksPerSecond = pick('ticksPerSecond')
    if (!(ticksPerSecond > 0) || !Number.isFinite(ticksPerSecond)) {
        throw new Error(`ticksPerSecond must be a positive number, got ${ticksPerSecond}`)
    }
    return {
        ticksPerSecond,
        tickInterval: overrides.tickInterval ?? 1 / ticksPerSecond,

        gravitationalConstant: pick('gravitationalConstant'),

        missileTimeToLive: pick('missileTimeToLive'),
        missileMaxVelocity: pick('missileMaxVelocity'),
        missileVelocityScale: pick('missileVelocityScale'),
        spawnStep: pick('spawnStep'),

        planetDensityMean: pick('planetDensityMean'),
        planetDensityStdDev: pick('planetDensityStdDev'),
        planetRadiusMean: pick('planetRadiusMean'),
        planetRadiusStdDev: pick('planetRadiusStdDev'),
        planetRadiusMin: pick('planetRadiusMin'),
        planetMaterialDensityMean: pick('planetMaterialDensityMean'),
        planetMaterialDensityStdDev: pick('planetMaterialDensityStdDev'),

        shipRadius: pick('shipRadius'),
        maxPlacementAttempts: pick('maxPlacementAttempts'),
        proximityMargin: pick('proximityMargin')
    }
}

/** m = (4/3)πr³ρ */
export function planetMass(radius: number, density: number): number {
    return (4 / 3) * Math.PI * Math.pow(radius, 3) * density
}
