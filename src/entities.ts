/**
 * Entity Factory Functions - Pure constructors for game objects
 *
 * Ship, Missile and Rock share position, speed and radius and differ in
 * where their direction comes from: ships and missiles derive it from their
 * heading, rocks carry a fixed random vector.
 */

import { Constants, Sprites } from "./constants";
import { add, headingToDirection, normalizeHeading, scale } from "./geometry";
import type {
    Entity,
    Missile,
    Rock,
    RockSize,
    Ship,
    SpriteName,
    Vec2,
} from "./types";
import { clamp, randomBetween, type RandomResult } from "./util";

const ROCK_SIZES: ReadonlyArray<RockSize> = ["big", "normal", "small"];

export const isRockSize = (value: string): value is RockSize =>
    ROCK_SIZES.some(size => size === value);

/**
 * Validate a rock size coming from an untyped source
 *
 * @throws Error when the value is not one of big, normal or small
 */
export const parseRockSize = (value: string): RockSize => {
    if (!isRockSize(value)) {
        throw new Error(`Unknown rock size: ${value}`);
    }
    return value;
};

export const createShip = (pos: Vec2): Ship => ({
    kind: "ship",
    pos,
    heading: 0,
    speed: 0,
    radius: Sprites.SHIP_WIDTH / 2,
    thrusting: false,
});

export const createMissile = (id: number, pos: Vec2, heading: number): Missile => ({
    kind: "missile",
    id,
    pos,
    heading: normalizeHeading(heading),
    speed: Constants.MISSILE_SPEED,
    radius: Sprites.MISSILE_WIDTH / 2,
});

/**
 * Create a rock with a random drift direction
 *
 * Each direction component is drawn independently from [-1, 1), so the
 * drift speed varies from rock to rock.
 *
 * @param seed - Current RNG seed; the advanced seed is returned alongside
 */
export const createRock = (
    id: number,
    pos: Vec2,
    size: RockSize,
    seed: number,
): Readonly<{ rock: Rock; seed: number }> => {
    const checkedSize = parseRockSize(size);
    const dx: RandomResult = randomBetween(seed, -1, 1);
    const dy: RandomResult = randomBetween(dx.seed, -1, 1);
    return {
        rock: {
            kind: "rock",
            id,
            size: checkedSize,
            pos,
            direction: { x: dx.value, y: dy.value },
            speed: Constants.ROCK_SPEED,
            radius: Sprites.ROCK_WIDTH[checkedSize] / 2,
        },
        seed: dy.seed,
    };
};

export const directionOf = (entity: Entity): Vec2 =>
    entity.kind === "rock" ? entity.direction : headingToDirection(entity.heading);

/** Advance an entity by one tick along its direction */
export const moveEntity = <E extends Entity>(entity: E): E => ({
    ...entity,
    pos: add(entity.pos, scale(directionOf(entity), entity.speed)),
});

export const rotateShip = (ship: Ship, deltaDegrees: number): Ship => ({
    ...ship,
    heading: normalizeHeading(ship.heading + deltaDegrees),
});

/**
 * Thrust on accelerates by one unit per tick up to the cap; thrust off
 * decelerates by one unit per tick down to a stop.
 */
export const thrustShip = (ship: Ship, on: boolean): Ship => ({
    ...ship,
    thrusting: on,
    speed: clamp(ship.speed + (on ? 1 : -1), 0, Constants.MAX_SHIP_SPEED),
});

/**
 * Spawn a missile at the ship's nose
 *
 * The nose sits half a sprite width/height from the centre along the
 * heading.
 */
export const fireMissile = (ship: Ship, id: number): Missile => {
    const direction = headingToDirection(ship.heading);
    const nose: Vec2 = {
        x: direction.x * (Sprites.SHIP_WIDTH / 2),
        y: direction.y * (Sprites.SHIP_HEIGHT / 2),
    };
    return createMissile(id, add(ship.pos, nose), ship.heading);
};

const ROCK_SPRITES: Readonly<Record<RockSize, SpriteName>> = {
    big: "rock-big",
    normal: "rock-normal",
    small: "rock-small",
};

export const shipSprite = (ship: Ship): SpriteName =>
    ship.thrusting ? "spaceship-on" : "spaceship-off";

export const spriteOf = (entity: Entity): SpriteName => {
    switch (entity.kind) {
        case "ship":
            return shipSprite(entity);
        case "missile":
            return "missile";
        case "rock":
            return ROCK_SPRITES[entity.size];
    }
};

/** Rocks do not turn; ships and missiles are drawn along their heading */
export const rotationOf = (entity: Entity): number =>
    entity.kind === "rock" ? 0 : entity.heading;
