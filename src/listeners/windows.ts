import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { NotificationCallback, NotificationListener } from "../types.js";
import { convertToastRecord } from "./toast-content.js";
import { createPowerShellToastHistory, ensureAccess } from "./toast-history.js";
import type { ToastHistory } from "./toast-history.js";

/** Interval between two toast history polls. */
export const POLL_INTERVAL_MS = 500;

/** Size above which the seen-id set is reset to the ids of the latest poll. */
export const SEEN_IDS_LIMIT = 1000;

/** Options for {@link createWindowsListener}. */
export interface WindowsListenerOptions {
  /** Toast history transport. Defaults to {@link createPowerShellToastHistory}. */
  history?: ToastHistory;
  /** Defaults to {@link POLL_INTERVAL_MS}. */
  pollIntervalMs?: number;
  logger?: Logger;
}

/**
 * Windows notification listener.
 *
 * Windows offers no push channel for other applications' toasts, so the
 * listener polls the toast history and delivers each id it has not seen yet.
 * Deliveries within one poll follow the platform's listing order, and polls
 * never overlap.
 *
 * The seen-id set is kept bounded with a coarse reset: once it holds more than
 * {@link SEEN_IDS_LIMIT} ids it is replaced by the ids of the latest poll. An id
 * dropped by a reset that is listed again later is delivered a second time.
 */
export interface WindowsListener extends NotificationListener {
  /**
   * Run one poll cycle: deliver every toast whose id has not been seen yet.
   *
   * @param signal - Aborts the listing; once aborted nothing more is delivered.
   */
  pollOnce(signal?: AbortSignal): Promise<void>;
  /** Ids already delivered (or skipped) by this listener. */
  readonly seenIds: ReadonlySet<number>;
}

/**
 * Settle with `task`, or reject with the abort reason as soon as `signal`
 * aborts, whichever comes first.
 */
function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    void task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Create a Windows notification listener.
 */
export function createWindowsListener(options: WindowsListenerOptions = {}): WindowsListener {
  const history = options.history ?? createPowerShellToastHistory();
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  const logger = options.logger ?? silentLogger;

  let running = false;
  let callback: NotificationCallback | null = null;
  let seen = new Set<number>();
  let pollTask: Promise<void> | null = null;
  let abortController: AbortController | null = null;

  async function pollOnce(signal?: AbortSignal): Promise<void> {
    const records = await history.getToastNotifications(signal);

    for (const record of records) {
      if (signal?.aborted) {
        return;
      }
      if (seen.has(record.id)) {
        continue;
      }
      seen.add(record.id);
      const payload = convertToastRecord(record, { logger });
      if (payload && running && callback) {
        await callback(payload);
      }
    }

    if (seen.size > SEEN_IDS_LIMIT) {
      seen = new Set(records.map((record) => record.id));
    }
  }

  async function pollLoop(signal: AbortSignal): Promise<void> {
    while (running && !signal.aborted) {
      try {
        await untilAborted(pollOnce(signal), signal);
      } catch (error: unknown) {
        if (signal.aborted) {
          return;
        }
        logger.error(`Error polling notifications: ${describeError(error)}`);
      }

      try {
        await delay(pollIntervalMs, undefined, { signal });
      } catch (error: unknown) {
        if (!signal.aborted) {
          logger.error(`Notification poll loop stopped: ${describeError(error)}`);
          running = false;
        }
        return;
      }
    }
  }

  return {
    get isRunning(): boolean {
      return running;
    },

    get seenIds(): ReadonlySet<number> {
      return seen;
    },

    /**
     * Request notification access and start polling.
     *
     * @throws {NotificationAccessError} If access is not granted.
     * @throws {PlatformSupportError} If the toast history cannot be reached.
     */
    async start(onNotification: NotificationCallback): Promise<void> {
      await ensureAccess(history);

      callback = onNotification;
      running = true;
      logger.info("Successfully obtained notification listener access");

      const controller = new AbortController();
      abortController = controller;
      pollTask = pollLoop(controller.signal);
    },

    /**
     * Stop polling. An in-flight listing is abandoned; the returned promise
     * settles once the poll loop has exited.
     */
    async stop(): Promise<void> {
      running = false;
      abortController?.abort();
      abortController = null;

      const task = pollTask;
      pollTask = null;
      if (task) {
        await task;
      }

      logger.info("Stopped Windows notification listener");
    },

    pollOnce,
  };
}
