/**
 * Rock placement
 *
 * Both spawners append the new rock to the state and advance the RNG seed
 * and id counter, so they compose like any other state transformation.
 */

import { Constants, Viewport } from "./constants";
import { createRock } from "./entities";
import { distance, vec } from "./geometry";
import type { RockSize, State, Vec2 } from "./types";
import { randomInt } from "./util";

type Sample = Readonly<{ pos: Vec2; seed: number }>;

const samplePosition = (
    seed: number,
    minX: number,
    maxX: number,
    minY: number,
    maxY: number,
): Sample => {
    const x = randomInt(seed, minX, maxX);
    const y = randomInt(x.seed, minY, maxY);
    return { pos: vec(x.value, y.value), seed: y.seed };
};

/** First try: inside the viewport, away from the edges */
const sampleInset = (seed: number): Sample =>
    samplePosition(
        seed,
        Constants.SPAWN_MARGIN,
        Viewport.CANVAS_WIDTH - Constants.SPAWN_MARGIN,
        Constants.SPAWN_MARGIN,
        Viewport.CANVAS_HEIGHT - Constants.SPAWN_MARGIN,
    );

/** Retries: anywhere in the viewport */
const sampleAnywhere = (seed: number): Sample =>
    samplePosition(seed, 0, Viewport.CANVAS_WIDTH, 0, Viewport.CANVAS_HEIGHT);

/** The viewport corner farthest from the given point */
export const farthestCorner = (from: Vec2): Vec2 =>
    [
        vec(0, 0),
        vec(Viewport.CANVAS_WIDTH, 0),
        vec(0, Viewport.CANVAS_HEIGHT),
        vec(Viewport.CANVAS_WIDTH, Viewport.CANVAS_HEIGHT),
    ].reduce((best, corner) =>
        distance(corner, from) > distance(best, from) ? corner : best,
    );

/**
 * Pick a spawn point at least `minDistance` away from `avoid`
 *
 * Gives up after MAX_SPAWN_ATTEMPTS samples and returns the farthest
 * viewport corner instead, with a warning.
 */
export const findSpawnPosition = (
    seed: number,
    avoid: Vec2,
    minDistance: number,
): Sample => {
    const search = (candidate: Sample, attempt: number): Sample => {
        if (distance(candidate.pos, avoid) >= minDistance) return candidate;
        if (attempt >= Constants.MAX_SPAWN_ATTEMPTS) {
            console.warn(
                `No rock spawn point ${minDistance} units from the ship after ${attempt} attempts; using the farthest corner`,
            );
            return { pos: farthestCorner(avoid), seed: candidate.seed };
        }
        return search(sampleAnywhere(candidate.seed), attempt + 1);
    };
    return search(sampleInset(seed), 1);
};

/** Deterministic placement, used when a rock splits */
export const spawnRockAt = (state: State, pos: Vec2, size: RockSize): State => {
    const { rock, seed } = createRock(state.nextId, pos, size, state.rngSeed);
    return {
        ...state,
        rocks: [...state.rocks, rock],
        rngSeed: seed,
        nextId: state.nextId + 1,
    };
};

/** Place a rock at a random point clear of the ship */
export const spawnRandomRock = (state: State, size: RockSize = "big"): State => {
    const { pos, seed } = findSpawnPosition(
        state.rngSeed,
        state.ship.pos,
        state.minRockDistance,
    );
    return spawnRockAt({ ...state, rngSeed: seed }, pos, size);
};

export const spawnRandomRocks = (state: State, count: number): State =>
    Array.from({ length: count }).reduce<State>(
        accumulated => spawnRandomRock(accumulated),
        state,
    );
