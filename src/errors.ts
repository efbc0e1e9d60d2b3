/**
 * The operating system denied access to its notification channel.
 */
export class NotificationAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotificationAccessError";
  }
}

/**
 * Platform support required by a listener is absent (missing runtime,
 * unavailable platform API).
 */
export class PlatformSupportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PlatformSupportError";
  }
}

/**
 * The message bus could not be reached.
 */
export class BusConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BusConnectionError";
  }
}

/**
 * The message bus answered a call with an error reply.
 */
export class BusReplyError extends Error {
  /** D-Bus error name, e.g. `org.freedesktop.DBus.Error.AccessDenied`. */
  readonly errorName: string;

  constructor(errorName: string, message: string) {
    super(`${errorName}: ${message}`);
    this.name = "BusReplyError";
    this.errorName = errorName;
  }
}

/**
 * No listener exists for the detected operating system.
 */
export class UnsupportedPlatformError extends Error {
  readonly platform: string;

  constructor(platform: string) {
    super(`Unsupported platform: ${platform}`);
    this.name = "UnsupportedPlatformError";
    this.platform = platform;
  }
}

/**
 * Render an unknown thrown value as a short message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
