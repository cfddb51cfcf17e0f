import { Subject } from "rxjs";
import { describe, expect, it } from "vitest";
import { heldCodes, isControlHeld, toControlKey, toInputEvent } from "../src/input";

describe("Key bindings", () => {
    it("should map arrows, WASD, Space and Enter to controls", () => {
        expect(toControlKey("ArrowLeft")).toBe("left");
        expect(toControlKey("KeyD")).toBe("right");
        expect(toControlKey("KeyW")).toBe("up");
        expect(toControlKey("Space")).toBe("fire");
        expect(toControlKey("NumpadEnter")).toBe("enter");
        expect(toControlKey("KeyQ")).toBeUndefined();
    });

    it("should turn key presses into input events", () => {
        expect(toInputEvent("Escape")).toEqual({ type: "quit" });
        expect(toInputEvent("Enter")).toEqual({ type: "keyDown", key: "enter" });
        expect(toInputEvent("Space")).toEqual({ type: "keyDown", key: "fire" });
        expect(toInputEvent("ShiftLeft")).toBeUndefined();
    });
});

describe("Held keys", () => {
    it("should track presses and releases", () => {
        const keyDown$ = new Subject<{ code: string }>();
        const keyUp$ = new Subject<{ code: string }>();
        const seen: string[][] = [];
        const subscription = heldCodes(keyDown$, keyUp$).subscribe(held =>
            seen.push([...held]),
        );

        keyDown$.next({ code: "ArrowUp" });
        keyDown$.next({ code: "Space" });
        keyUp$.next({ code: "ArrowUp" });
        subscription.unsubscribe();

        expect(seen).toEqual([[], ["ArrowUp"], ["ArrowUp", "Space"], ["Space"]]);
    });

    it("should release every key when focus is lost", () => {
        const keyDown$ = new Subject<{ code: string }>();
        const keyUp$ = new Subject<{ code: string }>();
        const blur$ = new Subject<void>();
        const seen: string[][] = [];
        const subscription = heldCodes(keyDown$, keyUp$, blur$).subscribe(held =>
            seen.push([...held]),
        );

        keyDown$.next({ code: "ArrowUp" });
        keyDown$.next({ code: "ArrowLeft" });
        blur$.next();
        keyDown$.next({ code: "Space" });
        subscription.unsubscribe();

        expect(seen).toEqual([
            [],
            ["ArrowUp"],
            ["ArrowUp", "ArrowLeft"],
            [],
            ["Space"],
        ]);
    });

    it("should treat a control as held while any of its keys is down", () => {
        const held = new Set(["KeyA", "Space"]);
        expect(isControlHeld(held, "left")).toBe(true);
        expect(isControlHeld(held, "fire")).toBe(true);
        expect(isControlHeld(held, "right")).toBe(false);
        expect(isControlHeld(new Set<string>(), "up")).toBe(false);
    });
});
