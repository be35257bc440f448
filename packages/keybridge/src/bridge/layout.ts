/**
 * Default axis layout, key assignments and button bindings for a third-person
 * camera scheme (WASD pan, PageUp/PageDown zoom, Delete/End rotate, arrows pitch).
 *
 * @module bridge/layout
 */

import type { AxisMode, ButtonBinding, KeySymbol } from "../core/types.js";
import type { AxisRoute } from "./axis-router.js";

/**
 * Engine that owns an axis. Each engine has its own tuning.
 */
export type EngineName = "move" | "zoom";

/**
 * Mode of an axis in the layout. `synced` axes follow the group mode
 * (see {@link ModeSync}) and start in it.
 */
export type LayoutMode = AxisMode | "synced";

/**
 * Placement of one logical direction.
 */
export interface AxisLayoutEntry {
  name: string;
  engine: EngineName;
  mode: LayoutMode;
}

/**
 * Signed channels routed to logical directions.
 * Roll is not routed.
 */
export const DEFAULT_AXIS_ROUTES: readonly AxisRoute[] = [
  { channel: "x", positive: "move_right", negative: "move_left" },
  { channel: "y", positive: "move_backward", negative: "move_forward" },
  { channel: "z", positive: "zoom_in", negative: "zoom_out" },
  { channel: "yaw", positive: "rotate_right", negative: "rotate_left" },
  { channel: "pitch", positive: "pitch_up", negative: "pitch_down" },
];

/**
 * Movement follows the group mode, zoom always pulses, rotation and pitch always hold.
 */
export const DEFAULT_AXIS_LAYOUT: readonly AxisLayoutEntry[] = [
  { name: "move_left", engine: "move", mode: "synced" },
  { name: "move_right", engine: "move", mode: "synced" },
  { name: "move_forward", engine: "move", mode: "synced" },
  { name: "move_backward", engine: "move", mode: "synced" },
  { name: "zoom_in", engine: "zoom", mode: "pulse" },
  { name: "zoom_out", engine: "zoom", mode: "pulse" },
  { name: "rotate_left", engine: "move", mode: "hold" },
  { name: "rotate_right", engine: "move", mode: "hold" },
  { name: "pitch_up", engine: "move", mode: "hold" },
  { name: "pitch_down", engine: "move", mode: "hold" },
];

/**
 * Default key per logical direction.
 */
export const DEFAULT_AXIS_KEYS: Readonly<Record<string, KeySymbol>> = {
  move_left: "a",
  move_right: "d",
  move_forward: "w",
  move_backward: "s",
  zoom_in: "page_up",
  zoom_out: "page_down",
  rotate_left: "delete",
  rotate_right: "end",
  pitch_up: "up",
  pitch_down: "down",
};

/**
 * Default bindings for the 15 buttons of a SpaceMouse receiver, by index.
 */
export const DEFAULT_BUTTON_BINDINGS: Readonly<Record<number, ButtonBinding>> = {
  0: "b", // character panels
  1: "alt_l", // world tooltips
  2: "ctrl_l", // toggle info
  3: "shift_l", // sneak cones
  4: "esc",
  5: "o", // tactical camera
  6: "tab", // combat mode
  7: "c", // sneak
  8: "space", // end turn
  9: "home", // center camera
  10: "m", // map
  11: "caps_lock", // flips character/camera mode through the lock-key LED
  12: "i", // inventory
  13: "l", // journal
  14: ["shift", "space"], // leave turn-based mode
};
