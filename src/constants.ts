/**
 * Using 'as const' assertions to create readonly constant objects.
 *
 * Grouping related constants together keeps game balance adjustable
 * in one place.
 */

import type { CueName, RockSize } from "./types";

/** Screen dimensions and coordinate system */
export const Viewport = {
    CANVAS_WIDTH: 800,
    CANVAS_HEIGHT: 600,
} as const;

/** Sprite extents in viewport units; collision radii derive from these */
export const Sprites = {
    SHIP_WIDTH: 48,
    SHIP_HEIGHT: 64,
    MISSILE_WIDTH: 8,
    MISSILE_HEIGHT: 20,
    ROCK_WIDTH: { big: 160, normal: 110, small: 60 },
} as const;

export const Constants = {
    // Timing
    TICKS_PER_SECOND: 30,
    TICK_RATE_MS: 1000 / 30,

    // Session
    INITIAL_LIVES: 3,
    INITIAL_ROCKS: 4,

    // Ship controls
    ROTATION_STEP: 10,
    MAX_SHIP_SPEED: 20,
    FIRE_COOLDOWN_MS: 150,

    // Entity speeds (units per tick)
    MISSILE_SPEED: 15,
    ROCK_SPEED: 4,

    // Rock placement
    SPAWN_MARGIN: 200,
    MAX_SPAWN_ATTEMPTS: 100,
    SPLIT_OFFSET: 10,
    INITIAL_MIN_ROCK_DISTANCE: 350,

    // Population policy
    RESPAWN_ROCK_CAP: 10,
    RAMP_ROCK_CAP: 15,

    // Difficulty ramp: every 20 seconds survived
    RAMP_INTERVAL_TICKS: 20 * 30,
    MIN_ROCK_DISTANCE_FLOOR: 200,
    ROCK_DISTANCE_STEP: 50,

    // Audio
    SOUNDTRACK_VOLUME: 0.3,
    TIMER_GRACE_SECONDS: 1,
    FALLBACK_CUE_SECONDS: 1,
} as const;

/** Missile-to-rock centre distance below which the rock is destroyed */
export const HIT_THRESHOLDS: Readonly<Record<RockSize, number>> = {
    big: 80,
    normal: 55,
    small: 30,
};

/** Rock-to-ship centre distance below which a life is lost */
export const DEATH_DISTANCES: Readonly<Record<RockSize, number>> = {
    big: 90,
    normal: 65,
    small: 40,
};

/** Smaller rocks are worth more */
export const ROCK_SCORES: Readonly<Record<RockSize, number>> = {
    big: 20,
    normal: 50,
    small: 100,
};

export const DEFAULT_CUE_DURATIONS: Readonly<Record<CueName, number>> = {
    fire: Constants.FALLBACK_CUE_SECONDS,
    die: Constants.FALLBACK_CUE_SECONDS,
    gameOver: Constants.FALLBACK_CUE_SECONDS,
};
