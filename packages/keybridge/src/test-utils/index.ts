/**
 * Test utilities for keybridge testing.
 *
 * @module test-utils
 */

export { RecordingActuator, type RecordedKeyEvent } from "./recording-actuator.js";
export { ScriptedReader, sampleOf } from "./scripted-reader.js";
