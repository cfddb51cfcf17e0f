/**
 * SVG renderer - the browser implementation of Renderer
 *
 * Draw calls are queued during a frame and applied on presentFrame().
 * SVG elements are pooled by draw order and reused from frame to frame
 * instead of being created and destroyed every tick.
 */

import { Sprites, Viewport } from "./constants";
import type { Renderer, SpriteName, TextStyle, Vec2 } from "./types";
import { getAssetUrl } from "./util";

type Size = Readonly<{ width: number; height: number }>;

const SPRITE_SIZES: Readonly<Record<SpriteName, Size>> = {
    "spaceship-off": { width: Sprites.SHIP_WIDTH, height: Sprites.SHIP_HEIGHT },
    "spaceship-on": { width: Sprites.SHIP_WIDTH, height: Sprites.SHIP_HEIGHT },
    missile: { width: Sprites.MISSILE_WIDTH, height: Sprites.MISSILE_HEIGHT },
    "rock-big": { width: Sprites.ROCK_WIDTH.big, height: Sprites.ROCK_WIDTH.big },
    "rock-normal": {
        width: Sprites.ROCK_WIDTH.normal,
        height: Sprites.ROCK_WIDTH.normal,
    },
    "rock-small": {
        width: Sprites.ROCK_WIDTH.small,
        height: Sprites.ROCK_WIDTH.small,
    },
};

const TEXT_STYLES: Readonly<Record<TextStyle, Record<string, string>>> = {
    score: { fill: "rgb(0, 155, 0)", "font-size": "36", "text-anchor": "end" },
    title: { fill: "rgb(255, 215, 0)", "font-size": "72", "text-anchor": "middle" },
    subtitle: { fill: "rgb(35, 107, 142)", "font-size": "28", "text-anchor": "middle" },
    gameOver: { fill: "rgb(255, 0, 0)", "font-size": "72", "text-anchor": "middle" },
};

type SpriteDraw = Readonly<{ sprite: SpriteName; center: Vec2; rotation: number }>;
type TextDraw = Readonly<{ text: string; pos: Vec2; style: TextStyle }>;

/**
 * Create SVG element with properties
 *
 * @param namespace - SVG namespace URI
 * @param name - Element tag name
 * @param props - Attributes to set on element
 */
const createSvgElement = (
    namespace: string | null,
    name: string,
    props: Record<string, string> = {},
): Element => {
    const elem = document.createElementNS(namespace, name);
    Object.entries(props).forEach(([k, v]) => elem.setAttribute(k, v));
    return elem;
};

/**
 * Grow or shrink a pool of elements to `count`, returning the live ones
 */
const resizePool = (
    svg: SVGSVGElement,
    pool: Element[],
    count: number,
    make: () => Element,
): ReadonlyArray<Element> => {
    while (pool.length < count) {
        const created = make();
        svg.appendChild(created);
        pool.push(created);
    }
    pool.splice(count).forEach(stale => stale.remove());
    return pool;
};

export const createSvgRenderer = (svg: SVGSVGElement): Renderer => {
    svg.setAttribute(
        "viewBox",
        `0 0 ${Viewport.CANVAS_WIDTH} ${Viewport.CANVAS_HEIGHT}`,
    );

    const spriteQueue: SpriteDraw[] = [];
    const textQueue: TextDraw[] = [];
    const spritePool: Element[] = [];
    const textPool: Element[] = [];

    return {
        drawSprite: (sprite, center, rotation) => {
            spriteQueue.push({ sprite, center, rotation });
        },
        drawText: (text, pos, style) => {
            textQueue.push({ text, pos, style });
        },
        presentFrame: () => {
            const images = resizePool(svg, spritePool, spriteQueue.length, () =>
                createSvgElement(svg.namespaceURI, "image"),
            );
            spriteQueue.forEach(({ sprite, center, rotation }, index) => {
                const { width, height } = SPRITE_SIZES[sprite];
                const image = images[index];
                image.setAttribute("href", getAssetUrl(`assets/${sprite}.svg`));
                image.setAttribute("width", `${width}`);
                image.setAttribute("height", `${height}`);
                image.setAttribute("x", `${center.x - width / 2}`);
                image.setAttribute("y", `${center.y - height / 2}`);
                // headings turn counter-clockwise, SVG rotates clockwise
                image.setAttribute(
                    "transform",
                    `rotate(${-rotation} ${center.x} ${center.y})`,
                );
            });

            const labels = resizePool(svg, textPool, textQueue.length, () =>
                createSvgElement(svg.namespaceURI, "text", {
                    "font-family": "'Press Start 2P', monospace",
                    "dominant-baseline": "middle",
                }),
            );
            textQueue.forEach(({ text, pos, style }, index) => {
                const label = labels[index];
                Object.entries(TEXT_STYLES[style]).forEach(([k, v]) =>
                    label.setAttribute(k, v),
                );
                label.setAttribute("x", `${pos.x}`);
                label.setAttribute("y", `${pos.y}`);
                label.textContent = text;
                // text stays above sprites
                svg.appendChild(label);
            });

            spriteQueue.length = 0;
            textQueue.length = 0;
        },
    };
};
