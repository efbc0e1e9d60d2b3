import { describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { createNotificationPayload } from "../payload.js";
import { isRecord } from "../types.js";
import type { NotificationPayload } from "../types.js";
import type { ToastRecord } from "./toast-history.js";

export const UNKNOWN_APP_NAME = "Unknown";

interface ToastText {
  summary: string;
  body: string;
}

function readTexts(value: unknown, source: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${source} is not a list`);
  }
  return value.map((text) => (typeof text === "string" ? text : ""));
}

function fromGenericBinding(record: ToastRecord): string[] {
  return readTexts(record.genericTexts, "generic binding");
}

function fromFirstBinding(record: ToastRecord): string[] {
  if (!Array.isArray(record.bindings)) {
    throw new Error("bindings are not a list");
  }
  for (const binding of record.bindings) {
    if (isRecord(binding) && Array.isArray(binding.texts) && binding.texts.length > 0) {
      return readTexts(binding.texts, "binding");
    }
  }
  return [];
}

const TEXT_STRATEGIES: ReadonlyArray<[string, (record: ToastRecord) => string[]]> = [
  ["ToastGeneric binding", fromGenericBinding],
  ["first visual binding", fromFirstBinding],
];

/**
 * Extract title and body from a toast's visual content. Each strategy may fail
 * on its own; the first one that yields any text wins.
 */
export function extractToastText(record: ToastRecord, logger: Logger = silentLogger): ToastText {
  for (const [label, strategy] of TEXT_STRATEGIES) {
    try {
      const texts = strategy(record);
      if (texts.length > 0) {
        return { summary: texts[0] ?? "", body: texts[1] ?? "" };
      }
    } catch (error: unknown) {
      logger.debug(`Could not extract notification text from ${label}: ${describeError(error)}`);
    }
  }
  return { summary: "", body: "" };
}

function readAppName(record: ToastRecord): string {
  const name = record.appDisplayName;
  return typeof name === "string" && name !== "" ? name : UNKNOWN_APP_NAME;
}

/**
 * Convert a toast history record into a payload, or `null` if conversion fails.
 *
 * Toasts expose no icon path, replacement id, timeout or actions, so those
 * fields always carry their empty values; the native id is kept in
 * `hints.windows_id`.
 */
export function convertToastRecord(
  record: ToastRecord,
  options: { logger?: Logger; now?: Date } = {},
): NotificationPayload | null {
  const logger = options.logger ?? silentLogger;
  try {
    const { summary, body } = extractToastText(record, logger);
    return createNotificationPayload(
      {
        appName: readAppName(record),
        summary,
        body,
        icon: "",
        replacesId: 0,
        actions: [],
        hints: { windows_id: record.id },
        timeout: -1,
      },
      options.now,
    );
  } catch (error: unknown) {
    logger.error(`Failed to convert notification: ${describeError(error)}`);
    return null;
  }
}
