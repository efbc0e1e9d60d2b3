// desktop-notification-bridge public API

// Bridge
export { createNotificationBridge } from "./bridge.js";
export type { BridgeOptions, NotificationBridge } from "./bridge.js";

// Types
export type {
  JsonValue,
  NotificationCallback,
  NotificationListener,
  NotificationPayload,
} from "./types.js";
export { createNotificationPayload, serializePayload } from "./payload.js";

// Listeners
export { getListener } from "./listeners/index.js";
export type { ListenerOptions } from "./listeners/index.js";
export { createLinuxListener } from "./listeners/linux.js";
export type { LinuxListenerOptions } from "./listeners/linux.js";
export { createWindowsListener } from "./listeners/windows.js";
export type { WindowsListener, WindowsListenerOptions } from "./listeners/windows.js";

// Forwarding
export { createForwarder } from "./forwarder.js";
export type { ForwarderOptions, NotificationForwarder } from "./forwarder.js";

// Configuration
export type { BridgeConfig } from "./config.js";
export { loadConfig, parseConfig } from "./config.js";

// Logging and errors
export type { Logger, LogLevel } from "./logger.js";
export { createLogger } from "./logger.js";
export {
  BusConnectionError,
  NotificationAccessError,
  PlatformSupportError,
  UnsupportedPlatformError,
} from "./errors.js";
