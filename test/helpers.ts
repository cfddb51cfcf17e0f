import { createRock } from "../src/entities";
import { vec } from "../src/geometry";
import { createInitialState } from "../src/state";
import type { Rock, RockSize, State, Vec2 } from "../src/types";

/** A session already in play, with no rocks unless the test adds some */
export const playingState = (overrides: Partial<State> = {}): State => ({
    ...createInitialState(),
    mode: "playing",
    nextId: 100,
    ...overrides,
});

/** A rock at a fixed spot that drifts along `direction` (still by default) */
export const rockAt = (
    id: number,
    x: number,
    y: number,
    size: RockSize,
    direction: Vec2 = vec(0, 0),
): Rock => ({ ...createRock(id, vec(x, y), size, 42).rock, direction });

/** `count` still rocks of one size, parked in a row along the bottom edge */
export const parkedRocks = (count: number, size: RockSize, firstId = 0): ReadonlyArray<Rock> =>
    Array.from({ length: count }, (_, index) =>
        rockAt(firstId + index, 20 + index * 40, 590, size),
    );
