import { assert, describe, expect, it } from "vitest";
import { state$ } from "../src/main";
import { clamp, randomBetween, randomInt } from "../src/util";

describe("Main Module", () => {
    it("should export the state stream factory", () => {
        assert.isFunction(state$);
    });
});

describe("Utilities", () => {
    it("should clamp values into a range", () => {
        expect(clamp(25, 0, 20)).toBe(20);
        expect(clamp(-3, 0, 20)).toBe(0);
        expect(clamp(7, 0, 20)).toBe(7);
    });

    it("should produce the same sequence for the same seed", () => {
        const first = randomBetween(42, 0, 1);
        const again = randomBetween(42, 0, 1);
        expect(again).toEqual(first);
        expect(randomBetween(first.seed, 0, 1).seed).not.toBe(first.seed);
    });

    it("should step the generator exactly, keeping the low bits", () => {
        const first = randomBetween(123456789, 0, 1).seed;
        const second = randomBetween(first, 0, 1).seed;
        const third = randomBetween(second, 0, 1).seed;
        expect([first, second, third]).toEqual([231794730, 1126946331, 1757975480]);
    });

    it("should not cycle within 50,000 draws", () => {
        const seen = new Set<number>();
        const last = Array.from({ length: 50_000 }).reduce<number>(seed => {
            seen.add(seed);
            return randomBetween(seed, 0, 1).seed;
        }, 123456789);
        expect(seen.has(last)).toBe(false);
        expect(seen.size).toBe(50_000);
        expect([...seen].some(seed => seed % 512 !== 0)).toBe(true);
    });

    it("should stay within the requested range", () => {
        Array.from({ length: 50 }, (_, index) => index * 7919 + 1).forEach(seed => {
            const { value } = randomBetween(seed, -1, 1);
            expect(value).toBeGreaterThanOrEqual(-1);
            expect(value).toBeLessThan(1);

            const { value: whole } = randomInt(seed, 1, 6);
            expect(Number.isInteger(whole)).toBe(true);
            expect(whole).toBeGreaterThanOrEqual(1);
            expect(whole).toBeLessThanOrEqual(6);
        });
    });
});
