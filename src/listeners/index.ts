import { UnsupportedPlatformError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { NotificationListener } from "../types.js";
import { createLinuxListener } from "./linux.js";
import type { LinuxListenerOptions } from "./linux.js";
import { createWindowsListener } from "./windows.js";
import type { WindowsListenerOptions } from "./windows.js";

export interface ListenerOptions {
  /** Passed to whichever listener is created, unless its own options set one. */
  logger?: Logger;
  linux?: LinuxListenerOptions;
  windows?: WindowsListenerOptions;
}

/**
 * Return a new listener for the given platform identifier.
 *
 * @param platform - A `process.platform` value. Defaults to the running OS.
 * @throws {UnsupportedPlatformError} For anything other than `"linux"` and `"win32"`.
 */
export function getListener(
  platform: string = process.platform,
  options: ListenerOptions = {},
): NotificationListener {
  if (platform === "linux") {
    return createLinuxListener({ logger: options.logger, ...options.linux });
  }
  if (platform === "win32") {
    return createWindowsListener({ logger: options.logger, ...options.windows });
  }
  throw new UnsupportedPlatformError(platform);
}
