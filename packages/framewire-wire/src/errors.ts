// Error taxonomy shared by every channel variant.
//
// Transport problems, peer-reported failures and framing violations are all
// ChannelErrors; the `kind` discriminant tells them apart.

export const ChannelErrorKind = {
  /** Payload exceeds the channel's max transmission length. Raised before any I/O. */
  OVERSIZED_PAYLOAD: "oversized_payload",
  /** Connect or write failed at the socket level. */
  TRANSPORT: "transport",
  /** The peer closed the stream while a response was expected. */
  PEER_TERMINATED: "peer_terminated",
  /** The caller aborted while a response was being received. */
  RECEIVE_ABORTED: "receive_aborted",
  /** The peer answered `failure <message>`. */
  REMOTE_FAILURE: "remote_failure",
  /** The peer answered `failure <timeout>`. */
  REMOTE_TIMEOUT: "remote_timeout",
  /** Malformed length header or status line. */
  PROTOCOL_VIOLATION: "protocol_violation",
  /** The channel was closed by its owner. */
  CLOSED: "closed",
  /** The channel variant cannot perform the operation. */
  UNSUPPORTED: "unsupported",
} as const;

export type ChannelErrorKind = (typeof ChannelErrorKind)[keyof typeof ChannelErrorKind];

/** Error raised by channel operations. */
export class ChannelError extends Error {
  readonly kind: ChannelErrorKind;

  constructor(kind: ChannelErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChannelError";
    this.kind = kind;
  }

  /** Whether the peer reported this error (as opposed to the transport failing). */
  isRemote(): boolean {
    return this.kind === ChannelErrorKind.REMOTE_FAILURE || this.kind === ChannelErrorKind.REMOTE_TIMEOUT;
  }

  static transport(message: string, cause?: unknown): ChannelError {
    return new ChannelError(ChannelErrorKind.TRANSPORT, message, { cause });
  }

  static peerTerminated(): ChannelError {
    return new ChannelError(ChannelErrorKind.PEER_TERMINATED, "The server unexpectedly died");
  }

  static receiveAborted(): ChannelError {
    return new ChannelError(
      ChannelErrorKind.RECEIVE_ABORTED,
      "Receive aborted, restart the server or call tryRepair() if you are sure the response will arrive",
    );
  }

  static remoteTimeout(): ChannelError {
    return new ChannelError(
      ChannelErrorKind.REMOTE_TIMEOUT,
      "Timeout: restart the server and increase its configured timeout",
    );
  }

  static protocol(context: string): ChannelError {
    return new ChannelError(ChannelErrorKind.PROTOCOL_VIOLATION, context);
  }

  static closed(): ChannelError {
    return new ChannelError(ChannelErrorKind.CLOSED, "channel closed");
  }

  static unsupported(operation: string): ChannelError {
    return new ChannelError(ChannelErrorKind.UNSUPPORTED, `${operation} is not supported by this channel`);
  }
}

/** Payload larger than the channel accepts. */
export class OversizedPayloadError extends ChannelError {
  constructor(
    readonly actual: number,
    readonly allowed: number,
  ) {
    super(
      ChannelErrorKind.OVERSIZED_PAYLOAD,
      `Data exceeds max transmission length ${actual} > ${allowed}`,
    );
    this.name = "OversizedPayloadError";
  }
}

/** The peer answered with `failure <message>`; the message is kept verbatim. */
export class RemoteFailureError extends ChannelError {
  constructor(readonly remoteMessage: string) {
    super(ChannelErrorKind.REMOTE_FAILURE, remoteMessage);
    this.name = "RemoteFailureError";
  }
}

/** Narrow an unknown thrown value to a ChannelError of the given kind. */
export function isChannelError(error: unknown, kind?: ChannelErrorKind): error is ChannelError {
  return error instanceof ChannelError && (kind === undefined || error.kind === kind);
}

/** Turn any thrown value into an Error, for returning errors as values. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
