import { describeError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { buildContentName, describeNotification, epochMicros } from "./naming.js";
import { serializePayload } from "./payload.js";
import type { NotificationPayload } from "./types.js";

/**
 * JSON body of `POST {baseUrl}/content`.
 */
export interface ContentRequest {
  content: string;
  bucket: string;
  name: string;
  content_type: "application/json";
  description: string;
}

/** Options for {@link createForwarder}. */
export interface ForwarderOptions {
  /** Base URL of the content API, without a trailing slash. */
  baseUrl: string;
  /** Bucket every notification is stored in. */
  bucket: string;
  /** HTTP client. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
  /** Abort a request after this many milliseconds. Defaults to 5000. */
  timeoutMs?: number;
  logger?: Logger;
  /** Epoch-microsecond clock, used by tests. */
  clock?: () => number;
}

/**
 * Delivers notification payloads to the remote content API.
 */
export interface NotificationForwarder {
  /** Send one notification. */
  forward(payload: NotificationPayload): Promise<void>;
  /** Base URL requests go to. */
  readonly targetUrl: string;
  /** Bucket notifications are stored in. */
  readonly bucket: string;
}

/**
 * Create a forwarder that POSTs each payload to `{baseUrl}/content`.
 *
 * Delivery is best-effort: a non-201 response or a transport failure is logged
 * and the notification is dropped, so `forward` never throws. There is no retry
 * and no queue; a slow API throttles the listener that awaits `forward`.
 */
export function createForwarder(options: ForwarderOptions): NotificationForwarder {
  const fetchFn = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 5000;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? epochMicros;
  let lastStamp = 0;

  // Strictly increasing, so two forwards in the same microsecond still get distinct names.
  function nextStamp(): number {
    const stamp = Math.max(clock(), lastStamp + 1);
    lastStamp = stamp;
    return stamp;
  }

  return {
    targetUrl: options.baseUrl,
    bucket: options.bucket,

    async forward(payload: NotificationPayload): Promise<void> {
      const name = buildContentName(payload.appName, nextStamp());
      const request: ContentRequest = {
        content: serializePayload(payload),
        bucket: options.bucket,
        name,
        content_type: "application/json",
        description: describeNotification(payload),
      };

      try {
        const response = await fetchFn(`${options.baseUrl}/content`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(request),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (response.status === 201) {
          logger.info(`Forwarded notification: ${name}`);
          return;
        }
        const text = await response.text();
        logger.warn(`Failed to forward notification: ${response.status} - ${text}`);
      } catch (error: unknown) {
        logger.error(`HTTP error forwarding notification: ${describeError(error)}`);
      }
    },
  };
}
