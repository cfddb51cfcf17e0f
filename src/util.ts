/**
 * Seeded randomness and small numeric helpers
 *
 * Nothing here reads global state: the random seed lives in `State` and
 * is passed in and handed back, so a session replays exactly from its seed.
 */

/** Linear congruential generator (glibc parameters) */
class RNG {
    private static m = 0x80000000;

    private static a = 1103515245;

    private static c = 12345;

    // m is 2^31: the low 31 bits of the exact 32-bit product
    static next = (seed: number): number =>
        (Math.imul(RNG.a, seed) + RNG.c) & (RNG.m - 1);

    /** Map a generator output onto [0, 1) */
    static toUnit = (value: number): number =>
        Math.min(value / (RNG.m - 1), 1 - Number.EPSILON);
}

/** A drawn value together with the seed for the following draw */
export type RandomResult = Readonly<{ value: number; seed: number }>;

/**
 * Uniform draw in [min, max)
 *
 * @param seed - seed carried in the game state
 */
export const randomBetween = (seed: number, min: number, max: number): RandomResult => {
    const next = RNG.next(seed);
    return { value: min + RNG.toUnit(next) * (max - min), seed: next };
};

/** Uniform integer in [min, max], both ends included */
export const randomInt = (seed: number, min: number, max: number): RandomResult => {
    const draw = randomBetween(seed, min, max + 1);
    return { ...draw, value: Math.floor(draw.value) };
};

export const clamp = (value: number, lower: number, upper: number): number =>
    Math.min(upper, Math.max(lower, value));

/**
 * Resolve a file under public/ against the page's base URL
 *
 * Outside a browser (tests) the relative path is returned as is.
 */
export const getAssetUrl = (assetPath: string): string =>
    typeof window === "undefined"
        ? assetPath
        : new URL(assetPath, `${window.location.origin}${import.meta.env.BASE_URL}`).href;
