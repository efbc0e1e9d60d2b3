import dbus from "dbus-next";
import type { Message, MessageBus } from "dbus-next";
import { BusConnectionError, BusReplyError, describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export type BusMessageKind = "method_call" | "method_return" | "error" | "signal";

/**
 * The parts of a bus message the listener inspects.
 */
export interface BusMessage {
  kind: BusMessageKind;
  interface?: string;
  member?: string;
  body: unknown[];
}

/**
 * Return `true` to tell the transport the message was consumed.
 */
export type BusMessageHandler = (message: BusMessage) => boolean;

/**
 * Minimal session bus surface the Linux listener needs. Keeping it small lets
 * tests drive the listener with an in-memory bus.
 */
export interface NotificationBus {
  /**
   * Ask the bus daemon to route messages matching `rule` to this connection.
   *
   * @throws {BusReplyError} If the daemon answers with an error reply.
   */
  addMatch(rule: string): Promise<void>;
  /** Receive every method call delivered to this connection. */
  addMessageHandler(handler: BusMessageHandler): void;
  disconnect(): void;
}

/** Opens a connection to the session bus. */
export type BusConnector = () => Promise<NotificationBus>;

function kindOf(type: number): BusMessageKind {
  switch (type) {
    case dbus.MessageType.METHOD_RETURN:
      return "method_return";
    case dbus.MessageType.ERROR:
      return "error";
    case dbus.MessageType.SIGNAL:
      return "signal";
    default:
      return "method_call";
  }
}

function toBusMessage(message: Message): BusMessage {
  const body: unknown[] = Array.isArray(message.body) ? message.body : [];
  return {
    kind: kindOf(message.type),
    interface: message.interface,
    member: message.member,
    body,
  };
}

/** The parts of a dbus-next `MessageBus` the adapter calls. */
export type MessageBusHandle = Pick<MessageBus, "call" | "addMethodHandler" | "disconnect">;

function uniqueNameOf(bus: MessageBusHandle): string | undefined {
  const name: unknown = Reflect.get(bus, "name");
  return typeof name === "string" ? name : undefined;
}

/**
 * Adapt a dbus-next connection to {@link NotificationBus}.
 */
export function createDBusNextBus(bus: MessageBusHandle): NotificationBus {
  return {
    async addMatch(rule: string): Promise<void> {
      const request = new dbus.Message({
        destination: "org.freedesktop.DBus",
        path: "/org/freedesktop/DBus",
        interface: "org.freedesktop.DBus",
        member: "AddMatch",
        signature: "s",
        body: [rule],
      });
      try {
        await bus.call(request);
      } catch (error: unknown) {
        if (error instanceof dbus.DBusError) {
          throw new BusReplyError(error.type, error.text);
        }
        throw error;
      }
    },

    addMessageHandler(handler: BusMessageHandler): void {
      bus.addMethodHandler((message: Message) => {
        const consumed = handler(toBusMessage(message));
        // dbus-next answers unhandled calls with an error reply; an eavesdropped
        // call belongs to another client and must never be answered from here.
        return consumed || message.destination !== uniqueNameOf(bus);
      });
    },

    disconnect(): void {
      bus.disconnect();
    },
  };
}

/**
 * Connect to the desktop session bus with dbus-next.
 *
 * Resolves once the bus daemon has accepted the connection.
 *
 * @throws {BusConnectionError} If no session bus is reachable.
 */
export async function connectSessionBus(logger: Logger = silentLogger): Promise<NotificationBus> {
  let bus: MessageBus;
  try {
    bus = dbus.sessionBus();
  } catch (error: unknown) {
    throw new BusConnectionError(`Could not open the session bus: ${describeError(error)}`, {
      cause: error,
    });
  }

  await new Promise<void>((resolve, reject) => {
    const onConnect = (): void => {
      bus.removeListener("error", onError);
      resolve();
    };
    const onError = (error: unknown): void => {
      bus.removeListener("connect", onConnect);
      reject(
        new BusConnectionError(`Could not connect to the session bus: ${describeError(error)}`, {
          cause: error,
        }),
      );
    };
    bus.once("connect", onConnect);
    bus.once("error", onError);
  });

  // dbus-next emits late transport failures as "error" events; an unhandled one would crash the process
  bus.on("error", (error: unknown) => {
    logger.error(`Session bus error: ${describeError(error)}`);
  });

  return createDBusNextBus(bus);
}
