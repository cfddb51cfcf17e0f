/**
 * Audio edge - performs the SoundEffects the simulation emits
 *
 * `playEffects` works against the AudioPort interface; `createHtmlAudio`
 * is the browser implementation backed by HTMLAudioElement.
 */

import { Constants } from "./constants";
import type { AudioPort, CueName, SoundEffect, TrackName } from "./types";
import { getAssetUrl } from "./util";

const CUES: ReadonlyArray<CueName> = ["fire", "die", "gameOver"];

const SOUND_FILES: Readonly<Record<CueName | TrackName, string>> = {
    fire: "assets/sounds/fire.wav",
    die: "assets/sounds/die.wav",
    gameOver: "assets/sounds/game_over.wav",
    soundtrack: "assets/sounds/soundtrack.wav",
};

export const playEffects =
    (audio: AudioPort) =>
    (effects: ReadonlyArray<SoundEffect>): void =>
        effects.forEach(effect => {
            switch (effect.kind) {
                case "loop":
                    audio.playLooping(effect.track, effect.volume);
                    break;
                case "stopLoop":
                    audio.stopLooping(effect.track);
                    break;
                case "once":
                    audio.playOnce(effect.cue);
                    break;
            }
        });

/** Length of every cue, in seconds, as the audio collaborator reports it */
export const readCueDurations = (audio: AudioPort): Readonly<Record<CueName, number>> => ({
    fire: audio.cueDurationSeconds("fire"),
    die: audio.cueDurationSeconds("die"),
    gameOver: audio.cueDurationSeconds("gameOver"),
});

/** Media duration, or the fallback while metadata is still loading */
export const durationOrFallback = (duration: number): number =>
    Number.isFinite(duration) && duration > 0
        ? duration
        : Constants.FALLBACK_CUE_SECONDS;

const logPlaybackError = (name: string) => (err: unknown) =>
    console.error(`Could not play sound "${name}":`, err);

/**
 * Browser audio backed by one preloaded element per sound
 *
 * One-shot cues play on a fresh element each time so rapid fire overlaps.
 */
export const createHtmlAudio = (): AudioPort => {
    const elements = new Map<CueName | TrackName, HTMLAudioElement>(
        [...CUES, "soundtrack" as const].map(
            (name): [CueName | TrackName, HTMLAudioElement] => {
                const element = new Audio(getAssetUrl(SOUND_FILES[name]));
                element.preload = "auto";
                return [name, element];
            },
        ),
    );

    return {
        playLooping: (track, volume) => {
            const element = elements.get(track);
            if (!element) return;
            element.loop = true;
            element.volume = volume;
            element.currentTime = 0;
            element.play().catch(logPlaybackError(track));
        },
        stopLooping: track => {
            elements.get(track)?.pause();
        },
        playOnce: cue => {
            new Audio(getAssetUrl(SOUND_FILES[cue]))
                .play()
                .catch(logPlaybackError(cue));
        },
        cueDurationSeconds: cue =>
            durationOrFallback(elements.get(cue)?.duration ?? Number.NaN),
    };
};
