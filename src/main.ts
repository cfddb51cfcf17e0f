/**
 * Application Entry Point
 *
 * Pure game logic sits at the core; the DOM, audio and clock are wired in
 * here at the edge and handed to the frame driver.
 */

// Import CSS for styling - side effect contained to startup
import "./style.css";
import { createHtmlAudio } from "./audio";
import { createKeyboardInput } from "./input";
import { runGame, state$ } from "./observable";
import { createSvgRenderer } from "./view";

// Re-exported so tests can reach the driver through the entry module
export { state$ };

if (typeof window !== "undefined") {
    const svg = document.querySelector("#svgCanvas");
    if (!(svg instanceof SVGSVGElement)) {
        throw new Error("Missing <svg id=\"svgCanvas\"> element");
    }

    runGame({
        input: createKeyboardInput(document),
        clock: { now: () => performance.now() },
        audio: createHtmlAudio(),
        renderer: createSvgRenderer(svg),
    });
}
