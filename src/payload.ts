import { inspect } from "node:util";
import { isPlainRecord } from "./types.js";
import type { JsonValue, NotificationPayload } from "./types.js";

/**
 * Fields of a {@link NotificationPayload} supplied by a listener. `receivedAt`
 * is stamped by {@link createNotificationPayload}.
 */
export type NotificationFields = Omit<NotificationPayload, "receivedAt">;

/**
 * Check whether a value can be represented in the JSON data model as-is.
 *
 * Only finite numbers and plain objects qualify, checked recursively.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "boolean":
    case "string":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every((item) => isJsonValue(item));
      }
      return isPlainRecord(value) && Object.values(value).every((item) => isJsonValue(item));
    default:
      return false;
  }
}

/**
 * Reduce an arbitrary value to a {@link JsonValue}.
 *
 * Representable values pass through unchanged. Anything else is replaced by its
 * textual form: decimal digits for a `bigint`, single-line `util.inspect`
 * output otherwise.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (isJsonValue(value)) {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Build a frozen {@link NotificationPayload}, stamping `receivedAt` with the
 * current UTC time.
 *
 * @param fields - Everything except `receivedAt`.
 * @param now - Clock override, used by tests.
 */
export function createNotificationPayload(
  fields: NotificationFields,
  now: Date = new Date(),
): NotificationPayload {
  return Object.freeze({
    appName: fields.appName,
    summary: fields.summary,
    body: fields.body,
    icon: fields.icon,
    replacesId: fields.replacesId,
    actions: Object.freeze([...fields.actions]),
    hints: Object.freeze({ ...fields.hints }),
    timeout: fields.timeout,
    receivedAt: now.toISOString(),
  });
}

/**
 * Serialize a payload to its canonical JSON text, using the wire field names
 * in their fixed order.
 */
export function serializePayload(payload: NotificationPayload): string {
  return JSON.stringify({
    app_name: payload.appName,
    summary: payload.summary,
    body: payload.body,
    icon: payload.icon,
    replaces_id: payload.replacesId,
    actions: payload.actions,
    hints: payload.hints,
    timeout: payload.timeout,
    received_at: payload.receivedAt,
  });
}
