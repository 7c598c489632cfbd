// Channel factory.
//
// The transport variant is chosen once, here, from the configuration; the
// protocol code in each variant never inspects which one it is.

import { withChannel, type Channel } from "@framewire/core";
import { createPipeChannel, type PipeChannelOptions } from "@framewire/pipe";
import { createSocketChannel, type SocketChannelOptions } from "@framewire/socket";

/** Configuration selecting and configuring a channel variant. */
export type ChannelConfig =
  | ({ transport: "socket" } & SocketChannelOptions)
  | ({ transport: "pipe" } & PipeChannelOptions);

/**
 * Open a channel to the interpreter server.
 *
 * Defaults to a socket channel addressed through the current platform's
 * profile.
 *
 * @example
 * ```typescript
 * const channel = await openChannel({ transport: "socket", id: "default" });
 * try {
 *   console.log(await channel.send("(plus 1 2)"));
 * } finally {
 *   await channel.close();
 * }
 * ```
 */
export async function openChannel(config: ChannelConfig = { transport: "socket" }): Promise<Channel> {
  switch (config.transport) {
    case "socket": {
      const { transport: _transport, ...options } = config;
      return createSocketChannel(options);
    }
    case "pipe": {
      const { transport: _transport, ...options } = config;
      return createPipeChannel(options);
    }
  }
}

/**
 * Open a channel, hand it to `use`, and close it afterwards whatever happens.
 * Errors raised while closing are discarded.
 */
export function useChannel<T>(config: ChannelConfig, use: (channel: Channel) => Promise<T>): Promise<T> {
  return withChannel(() => openChannel(config), use);
}
