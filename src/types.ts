/**
 * A value in JSON's data model. Hint values are always reduced to this shape
 * before they leave a listener.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Normalized, platform-independent representation of one desktop notification.
 *
 * Instances are frozen at construction and never mutated afterwards.
 */
export interface NotificationPayload {
  /** Display name of the source application, `"Unknown"` when unresolvable. */
  readonly appName: string;
  /** Title / short text. May be empty. */
  readonly summary: string;
  /** Long text. May be empty. */
  readonly body: string;
  /** Icon identifier or path, empty when unavailable. */
  readonly icon: string;
  /** Platform-native id of the notification this one replaces, `0` if none. */
  readonly replacesId: number;
  /** Flattened action id / label pairs. */
  readonly actions: readonly string[];
  /** Platform-specific metadata. */
  readonly hints: Readonly<Record<string, JsonValue>>;
  /** Platform-native timeout hint. `-1` means "no timeout". */
  readonly timeout: number;
  /** ISO 8601 UTC timestamp of when the listener normalized the notification. */
  readonly receivedAt: string;
}

/**
 * Callback a listener invokes once per observed notification.
 */
export type NotificationCallback = (payload: NotificationPayload) => Promise<void>;

/**
 * Contract every platform notification listener implements.
 *
 * `start` resolves once the listener is subscribed to the platform channel, not
 * when observation ends. `stop` is safe to call at any time, including before
 * `start` or after a failed `start`.
 */
export interface NotificationListener {
  /**
   * Begin observing the platform notification channel.
   *
   * @param callback - Invoked with each normalized notification.
   * @throws {NotificationAccessError} If the OS denies notification access.
   * @throws {PlatformSupportError} If platform support is absent.
   * @throws {BusConnectionError} If the notification transport cannot be reached.
   */
  start(callback: NotificationCallback): Promise<void>;
  /** Stop observing and release platform resources. */
  stop(): Promise<void>;
  /** Whether the listener is between a successful `start` and a completed `stop`. */
  readonly isRunning: boolean;
}

/**
 * Type guard that checks whether a value is a non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard for objects created by an object literal (or with a `null` prototype).
 * Class instances such as `Buffer` or a bus variant wrapper do not qualify.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
