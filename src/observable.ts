/**
 * Frame driver - Reactive Functional Programming (RxJS)
 *
 * Architecture: Unidirectional data flow
 * Ticks + Input Events → Actions → State Transformations → Audio / Renderer
 *
 * The driver holds no game logic: it samples input, turns it into actions,
 * folds them with scan(), and hands every resulting state to the edges.
 */

import type { Observable, Subscription } from "rxjs";
import {
    catchError,
    filter,
    interval,
    map,
    merge,
    scan,
    shareReplay,
    takeUntil,
    tap,
} from "rxjs";
import { Constants } from "./constants";
import { playEffects, readCueDurations } from "./audio";
import { drawSnapshot, toSnapshot } from "./snapshot";
import { Start, Tick, createInitialState, reduceState } from "./state";
import type {
    Action,
    AudioPort,
    Clock,
    CueName,
    HeldKeys,
    InputEvent,
    InputSource,
    Renderer,
    State,
} from "./types";

/** Query every control once, so a whole tick sees one consistent snapshot */
export const sampleKeys = (input: InputSource): HeldKeys => ({
    left: input.isKeyHeld("left"),
    right: input.isKeyHeld("right"),
    up: input.isKeyHeld("up"),
    fire: input.isKeyHeld("fire"),
});

export const isStartEvent = (event: InputEvent): boolean =>
    event.type === "pointerDown" ||
    (event.type === "keyDown" && event.key === "enter");

export type DriverDeps = Readonly<{
    input: InputSource;
    clock: Clock;
    /** Defaults to a 30 Hz interval */
    ticks$?: Observable<unknown>;
    initial?: State;
    /** Read when a session starts, so media metadata has had time to load */
    cueDurations?: () => Readonly<Record<CueName, number>>;
}>;

/**
 * Main state observable factory
 *
 * - tick$: one Tick per frame carrying the held keys and the clock reading
 * - start$: click or Enter becomes a Start action
 * - quit completes the stream
 */
export const state$ = ({
    input,
    clock,
    ticks$ = interval(Constants.TICK_RATE_MS),
    initial = createInitialState(),
    cueDurations,
}: DriverDeps): Observable<State> => {
    const quit$ = input.events$.pipe(filter(event => event.type === "quit"));

    const tick$ = ticks$.pipe(
        map((): Action => new Tick(sampleKeys(input), clock.now())),
    );

    const start$ = input.events$.pipe(
        filter(isStartEvent),
        map((): Action => new Start(cueDurations?.())),
    );

    return merge(tick$, start$).pipe(
        scan(reduceState, initial),
        takeUntil(quit$),
        shareReplay({ bufferSize: 1, refCount: true }),
    );
};

export type GameDeps = DriverDeps &
    Readonly<{
        audio: AudioPort;
        renderer: Renderer;
    }>;

/**
 * Wire the state stream to the audio and rendering collaborators
 *
 * @returns the subscription; unsubscribing stops the game loop
 */
export const runGame = (deps: GameDeps): Subscription => {
    const { audio, renderer } = deps;
    const cueDurations = deps.cueDurations ?? (() => readCueDurations(audio));
    return state$({ ...deps, cueDurations })
        .pipe(
            tap(state => playEffects(audio)(state.effects)),
            map(toSnapshot),
            catchError(err => {
                console.error("Game loop stopped:", err);
                throw err;
            }),
        )
        .subscribe(snapshot => drawSnapshot(renderer, snapshot));
};
