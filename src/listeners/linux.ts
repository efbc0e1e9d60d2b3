import { BusReplyError, describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { createNotificationPayload, toJsonValue } from "../payload.js";
import { isRecord } from "../types.js";
import type {
  JsonValue,
  NotificationCallback,
  NotificationListener,
  NotificationPayload,
} from "../types.js";
import { connectSessionBus } from "./dbus.js";
import type { BusConnector, BusMessage, NotificationBus } from "./dbus.js";

export const NOTIFICATIONS_INTERFACE = "org.freedesktop.Notifications";

export const NOTIFY_MATCH_RULE =
  "type='method_call'," +
  `interface='${NOTIFICATIONS_INTERFACE}',` +
  "member='Notify'," +
  "eavesdrop=true";

/** Options for {@link createLinuxListener}. */
export interface LinuxListenerOptions {
  /** Opens the session bus. Defaults to dbus-next. */
  connect?: BusConnector;
  logger?: Logger;
  /** Clock override for `receivedAt`, used by tests. */
  now?: () => Date;
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : String(value ?? "");
}

function asInteger(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return fallback;
}

function unwrapVariant(value: unknown): unknown {
  if (isRecord(value) && "signature" in value && "value" in value) {
    return value.value;
  }
  return value;
}

/**
 * Reduce an `a{sv}` hints dictionary to JSON values, unwrapping each variant.
 * Values outside the JSON model are kept in their textual form.
 */
export function normalizeHints(hints: unknown): Record<string, JsonValue> {
  const normalized: Record<string, JsonValue> = {};
  if (!isRecord(hints)) {
    return normalized;
  }
  for (const [key, value] of Object.entries(hints)) {
    normalized[key] = toJsonValue(unwrapVariant(value));
  }
  return normalized;
}

/**
 * Convert the body of a `Notify` call (signature `susssasa{sv}i`) into a
 * payload, or return `null` when fewer than 8 arguments are present.
 */
export function parseNotifyArguments(
  args: readonly unknown[],
  now: Date = new Date(),
): NotificationPayload | null {
  if (args.length < 8) {
    return null;
  }
  const [appName, replacesId, icon, summary, body, actions, hints, timeout] = args;
  return createNotificationPayload(
    {
      appName: asString(appName),
      summary: asString(summary),
      body: asString(body),
      icon: asString(icon),
      replacesId: asInteger(replacesId, 0),
      actions: Array.isArray(actions) ? actions.map((action) => asString(action)) : [],
      hints: normalizeHints(hints),
      timeout: asInteger(timeout, -1),
    },
    now,
  );
}

/**
 * Create a Linux notification listener.
 *
 * It eavesdrops on `org.freedesktop.Notifications.Notify` method calls on the
 * session bus. Each call is processed on a later event-loop turn so the bus
 * dispatch path never waits on the callback; distinct notifications may
 * therefore reach the callback out of order.
 */
export function createLinuxListener(options: LinuxListenerOptions = {}): NotificationListener {
  const logger = options.logger ?? silentLogger;
  const connect = options.connect ?? (() => connectSessionBus(logger));
  const now = options.now ?? (() => new Date());

  let bus: NotificationBus | null = null;
  let running = false;
  let callback: NotificationCallback | null = null;

  function release(): void {
    const current = bus;
    bus = null;
    current?.disconnect();
  }

  async function processNotification(message: BusMessage): Promise<void> {
    try {
      const payload = parseNotifyArguments(message.body, now());
      if (payload === null) {
        logger.warn("Malformed notification message:", message.body);
        return;
      }

      logger.info(`Received notification: [${payload.appName}] ${payload.summary}`);

      if (running && callback) {
        await callback(payload);
      }
    } catch (error: unknown) {
      logger.error(`Error processing notification: ${describeError(error)}`);
    }
  }

  function handleMessage(message: BusMessage): boolean {
    if (
      running &&
      message.kind === "method_call" &&
      message.interface === NOTIFICATIONS_INTERFACE &&
      message.member === "Notify"
    ) {
      setImmediate(() => {
        void processNotification(message);
      });
    }
    return false;
  }

  return {
    get isRunning(): boolean {
      return running;
    },

    /**
     * Connect to the session bus and subscribe to `Notify` calls.
     *
     * A rejected match rule is logged and leaves the listener stopped without
     * throwing; a connection failure propagates.
     */
    async start(onNotification: NotificationCallback): Promise<void> {
      callback = onNotification;
      const connected = await connect();
      bus = connected;

      try {
        await connected.addMatch(NOTIFY_MATCH_RULE);
      } catch (error: unknown) {
        if (!(error instanceof BusReplyError)) {
          release();
          throw error;
        }
        logger.error(`Failed to add match rule: ${error.message}`);
        release();
        return;
      }

      connected.addMessageHandler(handleMessage);
      running = true;
      logger.info("Successfully subscribed to D-Bus notifications");
    },

    async stop(): Promise<void> {
      running = false;
      if (bus) {
        release();
        logger.info("Disconnected from D-Bus");
      }
    },
  };
}
