/**
 * Render snapshot - what the renderer draws for a given state
 *
 * `toSnapshot` is pure; `drawSnapshot` replays a snapshot onto any
 * Renderer, so the drawing order can be tested without a DOM.
 */

import { Sprites, Viewport } from "./constants";
import { rotationOf, spriteOf } from "./entities";
import { vec } from "./geometry";
import type {
    Drawable,
    Entity,
    RenderSnapshot,
    Renderer,
    State,
    Vec2,
} from "./types";

export const WELCOME_TITLE = "Asteroids";
export const WELCOME_PROMPT = "[Click anywhere/press Enter] to begin!";
export const GAME_OVER_TEXT = "GAME OVER";

const drawableId = (entity: Entity): string =>
    entity.kind === "ship" ? "ship" : `${entity.kind}-${entity.id}`;

const toDrawable = (entity: Entity): Drawable => ({
    id: drawableId(entity),
    sprite: spriteOf(entity),
    pos: entity.pos,
    rotation: rotationOf(entity),
});

export const toSnapshot = (state: State): RenderSnapshot => {
    if (state.mode === "welcome") {
        return {
            drawables: [],
            hud: { score: "", lives: 0, banner: "welcome" },
        };
    }
    return {
        drawables: [state.ship, ...state.missiles, ...state.rocks].map(toDrawable),
        hud: {
            score: state.score.toString(),
            lives: state.lives,
            banner:
                state.mode === "gameOver" || state.mode === "starting"
                    ? "gameOver"
                    : null,
        },
    };
};

/** Where the n-th remaining-life icon sits, left to right along the top */
export const lifeIconPosition = (index: number): Vec2 =>
    vec(Sprites.SHIP_WIDTH * index * 1.2 + 40, Sprites.SHIP_HEIGHT / 2);

export const SCORE_POSITION = vec(Viewport.CANVAS_WIDTH - 40, 40);

const CENTER = vec(Viewport.CANVAS_WIDTH / 2, Viewport.CANVAS_HEIGHT / 2);

export const drawSnapshot = (renderer: Renderer, snapshot: RenderSnapshot): void => {
    const { drawables, hud } = snapshot;

    if (hud.banner === "welcome") {
        renderer.drawText(WELCOME_TITLE, vec(CENTER.x, CENTER.y - 60), "title");
        renderer.drawText(WELCOME_PROMPT, vec(CENTER.x, CENTER.y + 40), "subtitle");
        renderer.presentFrame();
        return;
    }

    drawables.forEach(({ sprite, pos, rotation }) =>
        renderer.drawSprite(sprite, pos, rotation),
    );
    renderer.drawText(hud.score, SCORE_POSITION, "score");
    if (hud.banner === "gameOver") {
        renderer.drawText(GAME_OVER_TEXT, CENTER, "gameOver");
    }
    Array.from({ length: hud.lives }, (_, index) => index).forEach(index =>
        renderer.drawSprite("spaceship-off", lifeIconPosition(index), 0),
    );
    renderer.presentFrame();
};
