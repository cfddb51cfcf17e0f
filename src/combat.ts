/**
 * Collision & combat resolution - runs once per tick while playing
 *
 * Collections are never edited while they are being scanned: each pass
 * folds the old collection into a freshly built one, so a rock destroyed
 * or respawned mid-scan cannot disturb the iteration.
 */

import {
    Constants,
    DEATH_DISTANCES,
    HIT_THRESHOLDS,
    ROCK_SCORES,
    Viewport,
} from "./constants";
import { moveEntity } from "./entities";
import { distance, vec } from "./geometry";
import { spawnRandomRock, spawnRockAt } from "./spawner";
import type { Missile, Rock, State, Vec2 } from "./types";

const VIEWPORT_CENTER = vec(Viewport.CANVAS_WIDTH / 2, Viewport.CANVAS_HEIGHT / 2);

/** Radius of the circle that encloses the whole viewport */
export const BOUNDING_RADIUS = Math.hypot(
    Viewport.CANVAS_WIDTH / 2,
    Viewport.CANVAS_HEIGHT / 2,
);

export const isOutOfBounds = (pos: Vec2): boolean =>
    distance(pos, VIEWPORT_CENTER) > BOUNDING_RADIUS;

export const hitsRock = (missile: Missile, rock: Rock): boolean =>
    distance(missile.pos, rock.pos) < HIT_THRESHOLDS[rock.size];

export const hitsShip = (rock: Rock, shipPos: Vec2): boolean =>
    distance(rock.pos, shipPos) < DEATH_DISTANCES[rock.size];

const splitInTwo = (state: State, rock: Rock, into: "normal" | "small"): State =>
    spawnRockAt(
        spawnRockAt(state, vec(rock.pos.x + Constants.SPLIT_OFFSET, rock.pos.y), into),
        vec(rock.pos.x - Constants.SPLIT_OFFSET, rock.pos.y),
        into,
    );

/**
 * Remove a rock hit by a missile, award its points and break it up
 *
 * - big: two normal rocks either side of it
 * - normal: two small rocks either side of it
 * - small: one new big rock elsewhere, if fewer than 10 rocks remain
 */
export const destroyRock = (state: State, rock: Rock): State => {
    const remaining: State = {
        ...state,
        rocks: state.rocks.filter(other => other.id !== rock.id),
        score: state.score + ROCK_SCORES[rock.size],
    };
    switch (rock.size) {
        case "big":
            return splitInTwo(remaining, rock, "normal");
        case "normal":
            return splitInTwo(remaining, rock, "small");
        case "small":
            return remaining.rocks.length < Constants.RESPAWN_ROCK_CAP
                ? spawnRandomRock(remaining, "big")
                : remaining;
    }
};

/**
 * Move every missile and resolve its hits
 *
 * A missile is spent on the first rock it reaches; fragments spawned by
 * an earlier missile can be hit by a later one in the same tick. Missiles
 * that leave the viewport's bounding circle are dropped.
 */
export const resolveMissiles = (state: State): State =>
    state.missiles.reduce<State>(
        (current, missile) => {
            const moved = moveEntity(missile);
            const target = current.rocks.find(rock => hitsRock(moved, rock));
            if (target !== undefined) return destroyRock(current, target);
            if (isOutOfBounds(moved.pos)) return current;
            return { ...current, missiles: [...current.missiles, moved] };
        },
        { ...state, missiles: [] },
    );

/**
 * Move every rock, then check it against the ship and the viewport
 *
 * A rock that reaches the ship does not also get the out-of-bounds check
 * that tick. A rock outside the bounding circle is removed and replaced
 * by one of the same size while fewer than 10 rocks remain.
 *
 * @returns the updated state and whether any rock reached the ship
 */
export const resolveRocks = (
    state: State,
): Readonly<{ state: State; shipHit: boolean }> => {
    const movedRocks = state.rocks.map(rock => moveEntity(rock));
    return movedRocks.reduce<Readonly<{ state: State; shipHit: boolean }>>(
        ({ state: current, shipHit }, rock) => {
            if (hitsShip(rock, current.ship.pos)) {
                return { state: current, shipHit: true };
            }
            if (isOutOfBounds(rock.pos)) {
                const without: State = {
                    ...current,
                    rocks: current.rocks.filter(other => other.id !== rock.id),
                };
                return {
                    state:
                        without.rocks.length < Constants.RESPAWN_ROCK_CAP
                            ? spawnRandomRock(without, rock.size)
                            : without,
                    shipHit,
                };
            }
            return { state: current, shipHit };
        },
        { state: { ...state, rocks: movedRocks }, shipHit: false },
    );
};

/**
 * Count one more tick survived; every 20 seconds add a big rock (up to 15)
 * and let rocks spawn 50 units closer to the ship (down to 200).
 */
export const applyDifficultyRamp = (state: State): State => {
    const survivalTicks = state.survivalTicks + 1;
    if (survivalTicks < Constants.RAMP_INTERVAL_TICKS) {
        return { ...state, survivalTicks };
    }
    const withRock =
        state.rocks.length < Constants.RAMP_ROCK_CAP
            ? spawnRandomRock(state, "big")
            : state;
    return {
        ...withRock,
        minRockDistance:
            withRock.minRockDistance > Constants.MIN_ROCK_DISTANCE_FLOOR
                ? withRock.minRockDistance - Constants.ROCK_DISTANCE_STEP
                : withRock.minRockDistance,
        survivalTicks: 0,
    };
};
