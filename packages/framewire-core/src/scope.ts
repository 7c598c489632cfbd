// Scoped channel acquisition.
//
// Channels are released on every exit path of the scope that opened them,
// instead of relying on garbage collection to close the socket.

import type { Channel } from "./channel.ts";
import { createLogger, type Logger } from "./logging.ts";

const defaultLogger = createLogger("framewire:scope");

/** Close a channel, discarding (and debug-logging) any error. */
export async function closeQuietly(channel: Channel, logger: Logger = defaultLogger): Promise<void> {
  try {
    await channel.close();
  } catch (error) {
    logger.debug("discarded error while closing channel", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Open a channel, run `use` with it, and close it whether `use` resolves or
 * rejects. Errors raised while closing are discarded.
 *
 * @example
 * ```typescript
 * const answer = await withChannel(
 *   () => createSocketChannel({ id: "default" }),
 *   (channel) => channel.send("(plus 1 2)"),
 * );
 * ```
 */
export async function withChannel<C extends Channel, T>(
  open: () => Promise<C>,
  use: (channel: C) => Promise<T>,
  logger: Logger = defaultLogger,
): Promise<T> {
  const channel = await open();
  try {
    return await use(channel);
  } finally {
    await closeQuietly(channel, logger);
  }
}
