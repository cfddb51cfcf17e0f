/**
 * 2D vector helpers. Every function returns a new Vec2.
 */

import type { Vec2 } from "./types";

export const vec = (x: number, y: number): Vec2 => ({ x, y });

export const add = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });

export const scale = (v: Vec2, factor: number): Vec2 => ({
    x: v.x * factor,
    y: v.y * factor,
});

export const distance = (p: Vec2, q: Vec2): number =>
    Math.hypot(p.x - q.x, p.y - q.y);

export const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Unit direction for a heading in degrees.
 * Heading 0 points up the screen (negative y), positive headings turn
 * counter-clockwise.
 */
export const headingToDirection = (heading: number): Vec2 => ({
    x: Math.sin(-toRadians(heading)),
    y: -Math.cos(toRadians(heading)),
});

/** Wrap any angle into [0, 360) */
export const normalizeHeading = (heading: number): number =>
    ((heading % 360) + 360) % 360;
