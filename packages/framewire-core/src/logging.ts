// Logging for framewire channels.
//
// Debug output is gated by DEBUG namespace patterns (like npm's debug
// package): `DEBUG=framewire:*`, `DEBUG=*,-framewire:pipe`.

import { encodeText } from "@framewire/wire";
import type { Channel, RepairResult, SendOptions } from "./channel.ts";

export interface Logger {
  /** Printed only when the logger's namespace is enabled. */
  debug(message: string, data?: Record<string, unknown>): void;
  /** Always printed. */
  warn(message: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by the DEBUG environment variable.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/** Create a console logger for a namespace. */
export function createLogger(namespace: string): Logger {
  return {
    debug(message, data) {
      if (!isEnabled(namespace)) return;
      if (data === undefined) console.log(`${namespace} ${message}`);
      else console.log(`${namespace} ${message}`, data);
    },
    warn(message, data) {
      if (data === undefined) console.warn(`${namespace} ${message}`);
      else console.warn(`${namespace} ${message}`, data);
    },
  };
}

export interface LoggingOptions {
  /**
   * Namespace for DEBUG matching. Defaults to "framewire:channel".
   */
  namespace?: string;

  /**
   * Log request and response payloads. Defaults to true.
   */
  logPayloads?: boolean;

  /**
   * Minimum duration (ms) to log. Sends faster than this skip the response line.
   * Defaults to 0 (log every send).
   */
  minDuration?: number;
}

/**
 * Wrap a channel so that every `send` is logged with timing information.
 * Logging is controlled by DEBUG, so the wrapper is silent unless enabled.
 *
 * Logs structured objects:
 * - Request: { type: "request", length, payload? }
 * - Response: { type: "response", duration, ok, payload? | error? }
 *
 * @example
 * ```typescript
 * const channel = loggingChannel(await openChannel({ transport: "socket" }));
 * await channel.send("(plus 1 2)");
 * // DEBUG=framewire:* prints "→ send" and "← send: ✓ 0.42ms"
 * ```
 */
export function loggingChannel(channel: Channel, options: LoggingOptions = {}): Channel {
  const namespace = options.namespace ?? "framewire:channel";
  const logPayloads = options.logPayloads ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    get maxTransmissionLength(): number {
      return channel.maxTransmissionLength;
    },
    set maxTransmissionLength(value: number) {
      channel.maxTransmissionLength = value;
    },

    async send(data: string, sendOptions?: SendOptions): Promise<string> {
      const startTime = performance.now();

      if (isEnabled(namespace)) {
        const logObj: Record<string, unknown> = { type: "request", length: encodeText(data).length };
        if (logPayloads) logObj.payload = data;
        console.log("→ send", logObj);
      }

      const logOutcome = (outcome: { ok: true; value: string } | { ok: false; error: unknown }) => {
        const duration = performance.now() - startTime;
        if (duration < minDuration || !isEnabled(namespace)) return;

        const logObj: Record<string, unknown> = {
          type: "response",
          duration: `${duration.toFixed(2)}ms`,
          ok: outcome.ok,
        };
        if (outcome.ok) {
          if (logPayloads) logObj.payload = outcome.value;
          console.log(`← send: ✓ ${duration.toFixed(2)}ms`, logObj);
        } else {
          const error = outcome.error;
          logObj.error =
            error instanceof Error ? { name: error.name, message: error.message } : error;
          console.log(`← send: ✗ ${duration.toFixed(2)}ms`, logObj);
        }
      };

      try {
        const value = await channel.send(data, sendOptions);
        logOutcome({ ok: true, value });
        return value;
      } catch (error) {
        logOutcome({ ok: false, error });
        throw error;
      }
    },

    close(): Promise<void> {
      return channel.close();
    },

    flush(): Promise<void> {
      return channel.flush();
    },

    async tryRepair(): Promise<RepairResult> {
      const result = await channel.tryRepair();
      if (isEnabled(namespace)) {
        console.log("tryRepair", result.ok ? { ok: true } : { ok: false, error: result.error.message });
      }
      return result;
    },
  };
}
