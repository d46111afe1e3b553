/**
 * Testing utilities for argroute integrators.
 * Import via: import { createOutputCapture } from "@argroute/sdk/testing";
 */

export { OutputCapture, createOutputCapture } from "./output-capture.js";
