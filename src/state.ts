/**
 * Game State Management - Pure Functional Implementation
 *
 * This module holds the game's state machine:
 *
 *   welcome ──start──▶ playing ──hit──▶ dying ──timer──▶ playing
 *                         ▲                  └─timer──▶ gameOver ──timer──▶ starting
 *                         └──────────────────────start──────────────────────────┘
 *
 * Architecture:
 * - State: complete game session as an immutable data structure
 * - Actions: Tick (one simulation frame) and Start (click / Enter)
 * - Timers: deadlines stored in State and checked by Tick, never real timers
 * - Effects: audio commands collected in State for the driver to perform
 */

import {
    Constants,
    DEFAULT_CUE_DURATIONS,
    Viewport,
} from "./constants";
import { applyDifficultyRamp, resolveMissiles, resolveRocks } from "./combat";
import {
    createShip,
    fireMissile,
    moveEntity,
    rotateShip,
    thrustShip,
} from "./entities";
import { vec } from "./geometry";
import { spawnRandomRocks } from "./spawner";
import type {
    Action,
    CueName,
    HeldKeys,
    ScheduledTimer,
    SoundEffect,
    State,
} from "./types";

export const SHIP_START = vec(Viewport.CANVAS_WIDTH / 2, Viewport.CANVAS_HEIGHT / 2);

export const NO_KEYS: HeldKeys = {
    left: false,
    right: false,
    up: false,
    fire: false,
};

export type SessionOptions = Readonly<{
    seed?: number;
    cueDurations?: Readonly<Record<CueName, number>>;
}>;

export const createInitialState = ({
    seed = 123456789,
    cueDurations = DEFAULT_CUE_DURATIONS,
}: SessionOptions = {}): State => ({
    mode: "welcome",
    ship: createShip(SHIP_START),
    missiles: [],
    rocks: [],
    lives: Constants.INITIAL_LIVES,
    score: 0,
    minRockDistance: Constants.INITIAL_MIN_ROCK_DISTANCE,
    survivalTicks: 0,
    timer: null,
    time: 0,
    lastFireTime: Number.NEGATIVE_INFINITY,
    rngSeed: seed,
    nextId: 0,
    nextTimerToken: 0,
    cueDurations,
    effects: [],
});

export const initialState: State = createInitialState();

const emit = (state: State, ...effects: ReadonlyArray<SoundEffect>): State => ({
    ...state,
    effects: [...state.effects, ...effects],
});

/**
 * Arm a one-shot timer that fires once the given cue has finished playing,
 * plus a one second pause. Any timer already armed is replaced.
 */
const armTimer = (
    state: State,
    kind: ScheduledTimer["kind"],
    cue: CueName,
): State => ({
    ...state,
    timer: {
        kind,
        deadline:
            state.time +
            (state.cueDurations[cue] + Constants.TIMER_GRACE_SECONDS) * 1000,
        token: state.nextTimerToken,
    },
    nextTimerToken: state.nextTimerToken + 1,
});

export const cancelTimer = (state: State): State => ({ ...state, timer: null });

/** Fresh ship, no missiles, four big rocks and the soundtrack running */
const beginLife = (state: State): State =>
    emit(
        spawnRandomRocks(
            {
                ...state,
                mode: "playing",
                ship: createShip(SHIP_START),
                missiles: [],
                rocks: [],
            },
            Constants.INITIAL_ROCKS,
        ),
        {
            kind: "loop",
            track: "soundtrack",
            volume: Constants.SOUNDTRACK_VOLUME,
        },
    );

/** Reset lives, score and difficulty, then begin the first life */
export const startSession = (state: State): State =>
    beginLife(
        cancelTimer({
            ...state,
            lives: Constants.INITIAL_LIVES,
            score: 0,
            minRockDistance: Constants.INITIAL_MIN_ROCK_DISTANCE,
            survivalTicks: 0,
        }),
    );

/**
 * Ship destroyed: playing → dying
 *
 * Only acts while playing, so a second collision before the respawn
 * timer fires costs nothing.
 */
export const loseLife = (state: State): State => {
    if (state.mode !== "playing") return state;
    return armTimer(
        emit(
            {
                ...state,
                mode: "dying",
                lives: state.lives - 1,
                survivalTicks: 0,
            },
            { kind: "stopLoop", track: "soundtrack" },
            { kind: "once", cue: "die" },
        ),
        "respawn",
        "die",
    );
};

const gameOver = (state: State): State =>
    armTimer(
        emit({ ...state, mode: "gameOver" }, { kind: "once", cue: "gameOver" }),
        "restart",
        "gameOver",
    );

/** dying → playing with a fresh life, or dying → gameOver when none are left */
const respawn = (state: State): State =>
    state.lives >= 1 ? beginLife(state) : gameOver(state);

/**
 * Fire the armed timer if its deadline has passed
 *
 * The timer is disarmed first. A timer whose mode has already been left
 * is dropped without effect.
 */
export const expireTimer = (state: State): State => {
    const { timer } = state;
    if (timer === null || state.time < timer.deadline) return state;
    const disarmed = cancelTimer(state);
    switch (timer.kind) {
        case "respawn":
            return state.mode === "dying" ? respawn(disarmed) : disarmed;
        case "restart":
            return state.mode === "gameOver"
                ? { ...disarmed, mode: "starting" }
                : disarmed;
    }
};

/** Fire if the cooldown since the previous missile has passed */
export const tryFire = (state: State): State => {
    if (state.time - state.lastFireTime <= Constants.FIRE_COOLDOWN_MS) {
        return state;
    }
    return emit(
        {
            ...state,
            missiles: [...state.missiles, fireMissile(state.ship, state.nextId)],
            nextId: state.nextId + 1,
            lastFireTime: state.time,
        },
        { kind: "once", cue: "fire" },
    );
};

/** Apply rotation and thrust for the keys held this tick */
export const steerShip = (state: State, keys: HeldKeys): State => {
    // left turns counter-clockwise, right clockwise; both cancel out
    const delta =
        (keys.left ? Constants.ROTATION_STEP : 0) -
        (keys.right ? Constants.ROTATION_STEP : 0);
    return {
        ...state,
        ship: thrustShip(rotateShip(state.ship, delta), keys.up),
    };
};

/**
 * Tick Action - Advances the game by one frame
 *
 * Order within a frame:
 * 1. a due timer fires (and uses up the frame)
 * 2. fire, in any mode but welcome
 * 3. while playing: steer, missiles, rocks, ship movement, difficulty ramp
 */
export class Tick implements Action {
    constructor(
        private readonly keys: HeldKeys,
        private readonly now: number,
    ) {}

    apply(currentState: State): State {
        const clocked: State = { ...currentState, time: this.now, effects: [] };

        const afterTimer = expireTimer(clocked);
        if (afterTimer.timer !== clocked.timer) return afterTimer;

        const afterFire =
            afterTimer.mode !== "welcome" && this.keys.fire
                ? tryFire(afterTimer)
                : afterTimer;
        if (afterFire.mode !== "playing") return afterFire;

        const afterMissiles = resolveMissiles(steerShip(afterFire, this.keys));
        const { state: afterRocks, shipHit } = resolveRocks(afterMissiles);
        if (shipHit) return loseLife(afterRocks);

        return applyDifficultyRamp({
            ...afterRocks,
            ship: moveEntity(afterRocks.ship),
        });
    }
}

/**
 * Start Action - click or Enter on the welcome or "press enter" screen
 *
 * Ignored in every other mode.
 *
 * @param cueDurations - audio cue lengths read when the session starts
 */
export class Start implements Action {
    constructor(
        private readonly cueDurations?: Readonly<Record<CueName, number>>,
    ) {}

    apply(currentState: State): State {
        const cleared: State = { ...currentState, effects: [] };
        if (cleared.mode !== "welcome" && cleared.mode !== "starting") {
            return cleared;
        }
        return startSession({
            ...cleared,
            cueDurations: this.cueDurations ?? cleared.cueDurations,
        });
    }
}

export const reduceState = (s: State, action: Action): State => action.apply(s);
