import { execFile } from "node:child_process";
import { fileURLToPath } from "node:url";
import { NotificationAccessError, PlatformSupportError, describeError } from "../errors.js";
import { isRecord } from "../types.js";

/** Mirrors WinRT `UserNotificationListenerAccessStatus`. */
export type ToastAccessStatus = "Allowed" | "Denied" | "Unspecified";

/**
 * One entry of the toast history, in the shape the history script prints.
 * Only `id` is guaranteed; the other fields may be missing or malformed.
 */
export interface ToastRecord {
  /** Native `UserNotification.Id`. */
  id: number;
  /** `AppInfo.DisplayInfo.DisplayName`, when readable. */
  appDisplayName?: unknown;
  /** Text elements of the `ToastGeneric` binding, when readable. */
  genericTexts?: unknown;
  /** Every visual binding as `{ template, texts }`, when readable. */
  bindings?: unknown;
}

/**
 * Access to the platform toast-notification history.
 */
export interface ToastHistory {
  /** Ask the user for notification access. */
  requestAccess(): Promise<ToastAccessStatus>;
  /**
   * Currently active toast notifications, in platform listing order.
   *
   * @param signal - Aborts the listing when the listener stops.
   */
  getToastNotifications(signal?: AbortSignal): Promise<ToastRecord[]>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  signal?: AbortSignal;
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
}

/** Runs an executable with arguments and collects its output. */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

/** Upper bound for one run of the history script. */
export const COMMAND_TIMEOUT_MS = 10_000;

export interface PowerShellToastHistoryOptions {
  /** Defaults to `powershell.exe`. */
  executable?: string;
  /** Defaults to `scripts/toast-history.ps1` in the package root. */
  scriptPath?: string;
  /** Defaults to {@link COMMAND_TIMEOUT_MS}. */
  timeoutMs?: number;
  /** Defaults to `child_process.execFile`. */
  run?: CommandRunner;
}

const DEFAULT_SCRIPT_PATH = fileURLToPath(
  new URL("../../scripts/toast-history.ps1", import.meta.url),
);

const ACCESS_STATUSES: Set<string> = new Set(["Allowed", "Denied", "Unspecified"]);

function isAccessStatus(value: string): value is ToastAccessStatus {
  return ACCESS_STATUSES.has(value);
}

/**
 * Run a command with `execFile`, rejecting on spawn failure, non-zero exit,
 * timeout or abort.
 */
export const execFileRunner: CommandRunner = (file, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      {
        windowsHide: true,
        maxBuffer: 16 * 1024 * 1024,
        signal: options.signal,
        timeout: options.timeoutMs ?? 0,
      },
      (error, stdout, stderr) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Parse the JSON the history script prints for `-Mode list`.
 *
 * @throws {Error} If the output is not a JSON array of records with numeric ids.
 */
export function parseToastList(stdout: string): ToastRecord[] {
  const text = stdout.trim();
  if (text === "") {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new Error(`Invalid toast history output: ${describeError(error)}`);
  }
  // ConvertTo-Json prints a lone element as an object rather than an array
  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  return items.map((item, index) => {
    if (!isRecord(item) || typeof item.id !== "number" || !Number.isInteger(item.id)) {
      throw new Error(`Invalid toast history output: entry ${index} has no numeric id`);
    }
    return {
      id: item.id,
      appDisplayName: item.appDisplayName,
      genericTexts: item.genericTexts,
      bindings: item.bindings,
    };
  });
}

/**
 * Create a toast history backed by WinRT `UserNotificationListener`, reached
 * through a PowerShell script that prints JSON.
 */
export function createPowerShellToastHistory(
  options: PowerShellToastHistoryOptions = {},
): ToastHistory {
  const executable = options.executable ?? "powershell.exe";
  const scriptPath = options.scriptPath ?? DEFAULT_SCRIPT_PATH;
  const timeoutMs = options.timeoutMs ?? COMMAND_TIMEOUT_MS;
  const run = options.run ?? execFileRunner;

  function invoke(mode: "access" | "list", signal?: AbortSignal): Promise<CommandResult> {
    return run(
      executable,
      [
        "-NoProfile",
        "-NonInteractive",
        "-ExecutionPolicy",
        "Bypass",
        "-File",
        scriptPath,
        "-Mode",
        mode,
      ],
      { signal, timeoutMs },
    );
  }

  return {
    /**
     * @throws {PlatformSupportError} If PowerShell or the WinRT notification API is unavailable.
     */
    async requestAccess(): Promise<ToastAccessStatus> {
      let result: CommandResult;
      try {
        result = await invoke("access");
      } catch (error: unknown) {
        if (isMissingExecutable(error)) {
          throw new PlatformSupportError(
            `Windows notification support requires PowerShell (${executable} was not found)`,
            { cause: error },
          );
        }
        throw new PlatformSupportError(
          `Windows notification API is unavailable: ${describeError(error)}`,
          { cause: error },
        );
      }
      const status = result.stdout.trim();
      if (!isAccessStatus(status)) {
        throw new PlatformSupportError(`Unexpected notification access status: "${status}"`);
      }
      return status;
    },

    async getToastNotifications(signal?: AbortSignal): Promise<ToastRecord[]> {
      const result = await invoke("list", signal);
      return parseToastList(result.stdout);
    },
  };
}

/**
 * Request access and turn anything but `"Allowed"` into an error.
 *
 * @throws {NotificationAccessError} If access is not granted.
 */
export async function ensureAccess(history: ToastHistory): Promise<void> {
  const status = await history.requestAccess();
  if (status !== "Allowed") {
    throw new NotificationAccessError(
      `Notification access ${status === "Denied" ? "denied" : "not granted"}. ` +
        "Please enable notification access in Windows Settings > Privacy > Notifications.",
    );
  }
}
