/**
 * Type definitions for the Asteroids game.
 *
 * Design Decision:
 * - All types use `Readonly` to enforce immutability at compile-time
 * - ReadonlyArray prevents accidental mutations of collections
 * - Entities are a tagged union on `kind`, so one `moveEntity` serves all three
 * - Collaborators (renderer, audio, input, clock) are plain interfaces so the
 *   simulation never touches the DOM
 */

import type { Observable } from "rxjs";

// Union type for the controls the simulation reads each tick
export type ControlKey = "left" | "right" | "up" | "fire" | "enter";

// 2D vector with readonly properties
export type Vec2 = Readonly<{ x: number; y: number }>;

export type RockSize = "big" | "normal" | "small";

export type SpriteName =
    | "spaceship-off"
    | "spaceship-on"
    | "missile"
    | "rock-big"
    | "rock-normal"
    | "rock-small";

export type CueName = "fire" | "die" | "gameOver";

export type TrackName = "soundtrack";

/**
 * Player ship
 * - heading: facing angle in degrees, always within [0, 360)
 * - thrusting: selects the flame sprite and drives acceleration
 */
export type Ship = Readonly<{
    kind: "ship";
    pos: Vec2;
    heading: number;
    speed: number;
    radius: number;
    thrusting: boolean;
}>;

export type Missile = Readonly<{
    kind: "missile";
    id: number;
    pos: Vec2;
    heading: number;
    speed: number;
    radius: number;
}>;

/**
 * Drifting rock
 * - direction: random per-rock vector, fixed at creation
 * - size: picks sprite, thresholds, score and split behaviour
 */
export type Rock = Readonly<{
    kind: "rock";
    id: number;
    size: RockSize;
    pos: Vec2;
    direction: Vec2;
    speed: number;
    radius: number;
}>;

export type Entity = Ship | Missile | Rock;

export type GameMode = "welcome" | "playing" | "dying" | "gameOver" | "starting";

/**
 * Deferred one-shot transition, checked once per tick against the clock.
 * - respawn: armed on losing a life, leads back to play or to game over
 * - restart: armed on game over, flips to the "press enter" screen
 * - token: cancellation handle; a fired timer must still be the armed one
 */
export type ScheduledTimer = Readonly<{
    kind: "respawn" | "restart";
    deadline: number;
    token: number;
}>;

/** Audio commands produced by the simulation, performed by the driver */
export type SoundEffect =
    | Readonly<{ kind: "loop"; track: TrackName; volume: number }>
    | Readonly<{ kind: "stopLoop"; track: TrackName }>
    | Readonly<{ kind: "once"; cue: CueName }>;

/**
 * Controls sampled each tick. Enter is left out: starting a game is a
 * discrete event on `InputSource.events$`, not a held key.
 */
export type HeldKeys = Readonly<Record<Exclude<ControlKey, "enter">, boolean>>;

/**
 * Action interface for state transformations
 * - Each tick or player event becomes an Action
 * - apply() transforms current state to next state immutably
 */
export interface Action {
    apply(s: State): State;
}

/**
 * Complete game session - the single source of truth
 *
 * State Categories:
 * - Game entities: ship, missiles, rocks
 * - Game flow: mode, lives, score, timer
 * - Difficulty: minRockDistance, survivalTicks
 * - Timing: time (latest clock reading), lastFireTime
 * - Bookkeeping: rngSeed, nextId, nextTimerToken
 * - Audio: cueDurations (read once at start-up), effects (emitted by the last action)
 */
export type State = Readonly<{
    mode: GameMode;
    ship: Ship;
    missiles: ReadonlyArray<Missile>;
    rocks: ReadonlyArray<Rock>;
    lives: number;
    score: number;
    minRockDistance: number;
    survivalTicks: number;
    timer: ScheduledTimer | null;
    time: number;
    lastFireTime: number;
    rngSeed: number;
    nextId: number;
    nextTimerToken: number;
    cueDurations: Readonly<Record<CueName, number>>;
    effects: ReadonlyArray<SoundEffect>;
}>;

export type Drawable = Readonly<{
    id: string;
    sprite: SpriteName;
    pos: Vec2;
    rotation: number;
}>;

export type Banner = "welcome" | "gameOver";

/** Everything the renderer needs for one frame */
export type RenderSnapshot = Readonly<{
    drawables: ReadonlyArray<Drawable>;
    hud: Readonly<{
        score: string;
        lives: number;
        banner: Banner | null;
    }>;
}>;

export type TextStyle = "score" | "title" | "subtitle" | "gameOver";

export interface Renderer {
    drawSprite(sprite: SpriteName, center: Vec2, rotationDegrees: number): void;
    drawText(text: string, pos: Vec2, style: TextStyle): void;
    presentFrame(): void;
}

export interface AudioPort {
    playLooping(track: TrackName, volume: number): void;
    stopLooping(track: TrackName): void;
    playOnce(cue: CueName): void;
    cueDurationSeconds(cue: CueName): number;
}

export type InputEvent =
    | Readonly<{ type: "quit" }>
    | Readonly<{ type: "pointerDown" }>
    | Readonly<{ type: "keyDown"; key: ControlKey }>;

export interface InputSource {
    isKeyHeld(key: ControlKey): boolean;
    readonly events$: Observable<InputEvent>;
}

export interface Clock {
    now(): number;
}
