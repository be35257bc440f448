/**
 * @motionkeys/keybridge - 6-DOF motion controller to keyboard events
 *
 * Turns continuous analog axes into well-formed key presses and releases:
 * - Per-axis EMA smoothing of raw device samples
 * - Magnitude-to-rate pulsing with a hold override for strong input
 * - Rising-edge button taps, including ordered modifier combos
 * - A polling host with mode sync and a Socket.IO relay for remote readers/injectors
 */

// =============================================================================
// Core
// =============================================================================
export { AxisSignalFilter } from "./core/signal-filter.js";
export {
  PulseKeyEngine,
  DEFAULT_PULSE_ENGINE_CONFIG,
  resolvePulseEngineConfig,
} from "./core/pulse-engine.js";
export type { PulseEngineConfig } from "./core/pulse-engine.js";
export { ButtonEdgeDispatcher } from "./core/button-dispatcher.js";
export type { ButtonDispatcherOptions } from "./core/button-dispatcher.js";
export {
  createSafeActuator,
  warnActuatorError,
  LoggingKeyActuator,
} from "./core/actuator.js";
export type { KeyActuator, ActuatorAction, ActuatorErrorHandler } from "./core/actuator.js";
export { toAxisMode } from "./core/types.js";
export type {
  KeySymbol,
  AxisMode,
  AxisChannel,
  ButtonBinding,
  ButtonBindings,
  DeviceSample,
  AxisStateSnapshot,
} from "./core/types.js";

// =============================================================================
// Bridge host
// =============================================================================
export { KeyBridge } from "./bridge/key-bridge.js";
export type { KeyBridgeConfig } from "./bridge/key-bridge.js";
export { orientSample, routeSample, NEUTRAL_ORIENTATION } from "./bridge/axis-router.js";
export type { AxisRoute, AxisUpdate, OrientationOptions } from "./bridge/axis-router.js";
export {
  ModeSync,
  StaticModeSource,
  RemoteModeSource,
  describeGroupMode,
} from "./bridge/mode-sync.js";
export type { ModeSource, ModeGroupMember } from "./bridge/mode-sync.js";
export { LatestSampleReader, parseDeviceSample, deviceSampleSchema } from "./bridge/device-reader.js";
export type { DeviceReader } from "./bridge/device-reader.js";
export {
  DEFAULT_AXIS_ROUTES,
  DEFAULT_AXIS_LAYOUT,
  DEFAULT_AXIS_KEYS,
  DEFAULT_BUTTON_BINDINGS,
} from "./bridge/layout.js";
export type { AxisLayoutEntry, EngineName, LayoutMode } from "./bridge/layout.js";

// =============================================================================
// Socket relay
// =============================================================================
export { createBridgeServer, SocketKeyActuator } from "./create-server.js";
export type { CreateBridgeServerConfig, BridgeServerHandle, KeyEventTarget } from "./create-server.js";
export { createBridgeClient } from "./create-client.js";
export type { BridgeClientConfig, BridgeClientHandle } from "./create-client.js";
export { BridgeEvent, keyEventSchema, modeReportSchema } from "./protocol.js";
export type { BridgeEventName, KeyEventMessage, ModeReport } from "./protocol.js";
export { bridgeParser } from "./parser.js";

// =============================================================================
// Constants
// =============================================================================
export {
  DEFAULT_EMA_ALPHA,
  DEFAULT_PRESS_DURATION_SECONDS,
  DEFAULT_MIN_HZ,
  DEFAULT_MAX_HZ,
  DEFAULT_DEADZONE,
  DEFAULT_HOLD_THRESHOLD,
  PULSE_EPSILON,
  DEFAULT_SETTLE_DELAY_SECONDS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
} from "./constants.js";
