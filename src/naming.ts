import type { NotificationPayload } from "./types.js";

/**
 * Replace every code point that is not a Unicode letter or digit with `_`.
 */
export function sanitizeAppName(appName: string): string {
  return appName.replace(/[^\p{L}\p{N}]/gu, "_");
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Format an epoch timestamp in microseconds as `YYYYMMDD_HHMMSS_ffffff` (UTC).
 */
export function formatMicrosTimestamp(epochMicros: number): string {
  const micros = ((epochMicros % 1_000_000) + 1_000_000) % 1_000_000;
  const date = new Date((epochMicros - micros) / 1000);
  const day = `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}`;
  const time = `${pad(date.getUTCHours(), 2)}${pad(date.getUTCMinutes(), 2)}${pad(date.getUTCSeconds(), 2)}`;
  return `${day}_${time}_${pad(micros, 6)}`;
}

/**
 * Current UTC wall-clock time in epoch microseconds, at millisecond resolution.
 */
export function epochMicros(): number {
  return Date.now() * 1000;
}

/**
 * Name under which a notification is stored: sanitized app name plus a
 * microsecond UTC timestamp.
 */
export function buildContentName(appName: string, timestampMicros: number): string {
  return `${sanitizeAppName(appName)}_${formatMicrosTimestamp(timestampMicros)}`;
}

/**
 * Human-readable description sent alongside the stored content.
 */
export function describeNotification(payload: NotificationPayload): string {
  return `Notification from ${payload.appName}: ${payload.summary}`;
}
