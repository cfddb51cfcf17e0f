import { Subject } from "rxjs";
import { describe, expect, it, vi } from "vitest";
import { isStartEvent, runGame, sampleKeys, state$ } from "../src/observable";
import { createInitialState } from "../src/state";
import type {
    AudioPort,
    ControlKey,
    InputEvent,
    InputSource,
    Renderer,
    State,
} from "../src/types";

const fakeInput = (held: ReadonlySet<ControlKey>) => {
    const events$ = new Subject<InputEvent>();
    const input: InputSource = {
        isKeyHeld: key => held.has(key),
        events$,
    };
    return { input, events$ };
};

const fakeAudio = () => ({
    playLooping: vi.fn<AudioPort["playLooping"]>(),
    stopLooping: vi.fn<AudioPort["stopLooping"]>(),
    playOnce: vi.fn<AudioPort["playOnce"]>(),
    cueDurationSeconds: vi.fn<AudioPort["cueDurationSeconds"]>(() => 2),
});

const fakeRenderer = () => ({
    drawSprite: vi.fn<Renderer["drawSprite"]>(),
    drawText: vi.fn<Renderer["drawText"]>(),
    presentFrame: vi.fn<Renderer["presentFrame"]>(),
});

describe("Input sampling", () => {
    it("should read every steering control once, leaving Enter to events", () => {
        const { input } = fakeInput(new Set<ControlKey>(["left", "fire", "enter"]));
        expect(sampleKeys(input)).toEqual({
            left: true,
            right: false,
            up: false,
            fire: true,
        });
    });

    it("should start on a click or Enter only", () => {
        expect(isStartEvent({ type: "pointerDown" })).toBe(true);
        expect(isStartEvent({ type: "keyDown", key: "enter" })).toBe(true);
        expect(isStartEvent({ type: "keyDown", key: "fire" })).toBe(false);
        expect(isStartEvent({ type: "quit" })).toBe(false);
    });
});

describe("State stream", () => {
    const setup = () => {
        const held = new Set<ControlKey>();
        const { input, events$ } = fakeInput(held);
        const ticks$ = new Subject<number>();
        const clock = { now: () => 33 };
        const states: State[] = [];
        const done = { completed: false };
        const subscription = state$({
            input,
            clock,
            ticks$,
            initial: createInitialState({ seed: 1 }),
            cueDurations: () => ({ fire: 0.5, die: 1, gameOver: 2 }),
        }).subscribe({
            next: state => states.push(state),
            complete: () => {
                done.completed = true;
            },
        });
        return { held, events$, ticks$, states, done, subscription };
    };

    it("should start a session on click with the current cue durations", () => {
        const { events$, states, subscription } = setup();
        events$.next({ type: "pointerDown" });
        expect(states).toHaveLength(1);
        expect(states[0].mode).toBe("playing");
        expect(states[0].cueDurations).toEqual({ fire: 0.5, die: 1, gameOver: 2 });
        subscription.unsubscribe();
    });

    it("should fold each tick with the held keys and the clock", () => {
        const { held, events$, ticks$, states, subscription } = setup();
        ticks$.next(0);
        expect(states[0].mode).toBe("welcome");
        expect(states[0].time).toBe(33);

        events$.next({ type: "keyDown", key: "enter" });
        held.add("up");
        ticks$.next(1);
        expect(states).toHaveLength(3);
        expect(states[2].ship.speed).toBe(1);
        expect(states[2].ship.pos).toEqual({ x: 400, y: 299 });
        subscription.unsubscribe();
    });

    it("should complete when the player quits", () => {
        const { events$, ticks$, states, done } = setup();
        events$.next({ type: "pointerDown" });
        events$.next({ type: "quit" });
        expect(done.completed).toBe(true);
        ticks$.next(0);
        expect(states).toHaveLength(1);
    });
});

describe("Game loop", () => {
    it("should play the effects of each state and draw a frame", () => {
        const { input, events$ } = fakeInput(new Set<ControlKey>());
        const audio = fakeAudio();
        const renderer = fakeRenderer();
        const ticks$ = new Subject<number>();
        const subscription = runGame({
            input,
            clock: { now: () => 0 },
            ticks$,
            audio,
            renderer,
        });

        events$.next({ type: "pointerDown" });
        expect(audio.cueDurationSeconds).toHaveBeenCalledTimes(3);
        expect(audio.playLooping).toHaveBeenCalledWith("soundtrack", 0.3);
        expect(renderer.presentFrame).toHaveBeenCalledTimes(1);

        ticks$.next(0);
        expect(audio.playLooping).toHaveBeenCalledTimes(1);
        expect(renderer.presentFrame).toHaveBeenCalledTimes(2);

        subscription.unsubscribe();
        ticks$.next(1);
        expect(renderer.presentFrame).toHaveBeenCalledTimes(2);
    });
});
