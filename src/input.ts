/**
 * Keyboard and pointer input for the browser
 *
 * Raw DOM events become two things:
 * - a set of held controls the driver samples each tick
 * - discrete InputEvents (click, Enter, Escape) that trigger actions
 */

import {
    EMPTY,
    type Observable,
    filter,
    fromEvent,
    map,
    merge,
    scan,
    startWith,
} from "rxjs";
import type { ControlKey, InputEvent, InputSource } from "./types";

/** Arrow keys and WASD steer, Space fires, Enter starts */
const KEY_BINDINGS = new Map<string, ControlKey>([
    ["ArrowLeft", "left"],
    ["KeyA", "left"],
    ["ArrowRight", "right"],
    ["KeyD", "right"],
    ["ArrowUp", "up"],
    ["KeyW", "up"],
    ["Space", "fire"],
    ["Enter", "enter"],
    ["NumpadEnter", "enter"],
]);

export const QUIT_CODE = "Escape";

export const toControlKey = (code: string): ControlKey | undefined =>
    KEY_BINDINGS.get(code);

type KeyCode = Readonly<{ code: string }>;

type KeyChange =
    | Readonly<{ type: "press" | "release"; code: string }>
    | Readonly<{ type: "reset" }>;

const applyKeyChange = (
    held: ReadonlySet<string>,
    change: KeyChange,
): ReadonlySet<string> => {
    if (change.type === "reset") return new Set<string>();
    const next = new Set(held);
    if (change.type === "press") next.add(change.code);
    else next.delete(change.code);
    return next;
};

/**
 * Track which physical keys are down
 *
 * Emits the current set after every press or release, starting empty.
 * Any emission of `reset$` (focus lost) releases every key, since the
 * matching keyup events go to another window.
 */
export const heldCodes = (
    keyDown$: Observable<KeyCode>,
    keyUp$: Observable<KeyCode>,
    reset$: Observable<unknown> = EMPTY,
): Observable<ReadonlySet<string>> =>
    merge(
        keyDown$.pipe(map(({ code }): KeyChange => ({ type: "press", code }))),
        keyUp$.pipe(map(({ code }): KeyChange => ({ type: "release", code }))),
        reset$.pipe(map((): KeyChange => ({ type: "reset" }))),
    ).pipe(
        scan(applyKeyChange, new Set<string>()),
        startWith(new Set<string>()),
    );

/** A control is held if any key bound to it is down */
export const isControlHeld = (held: ReadonlySet<string>, key: ControlKey): boolean =>
    [...held].some(code => toControlKey(code) === key);

/** First press of a key (auto-repeat filtered out) as an InputEvent */
export const toInputEvent = (code: string): InputEvent | undefined => {
    if (code === QUIT_CODE) return { type: "quit" };
    const key = toControlKey(code);
    return key === undefined ? undefined : { type: "keyDown", key };
};

/**
 * Keyboard/pointer InputSource bound to a DOM target
 *
 * The held-key subscription lives as long as the page.
 */
export const createKeyboardInput = (target: Document): InputSource => {
    const keyDown$ = fromEvent<KeyboardEvent>(target, "keydown");
    const keyUp$ = fromEvent<KeyboardEvent>(target, "keyup");
    const view = target.defaultView;
    const blur$ = view ? fromEvent(view, "blur") : EMPTY;

    // Space and arrows would otherwise scroll the page
    keyDown$
        .pipe(filter(({ code }) => toControlKey(code) !== undefined))
        .subscribe(event => event.preventDefault());

    const latest: { held: ReadonlySet<string> } = { held: new Set() };
    heldCodes(keyDown$, keyUp$, blur$).subscribe(held => {
        latest.held = held;
    });

    const keyEvents$ = keyDown$.pipe(
        filter(({ repeat }) => !repeat),
        map(({ code }) => toInputEvent(code)),
        filter((event): event is InputEvent => event !== undefined),
    );
    const pointer$ = fromEvent<PointerEvent>(target, "pointerdown").pipe(
        map((): InputEvent => ({ type: "pointerDown" })),
    );

    return {
        isKeyHeld: key => isControlHeld(latest.held, key),
        events$: merge(keyEvents$, pointer$),
    };
};
