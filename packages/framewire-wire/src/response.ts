// Response status line.
//
// A response payload reads `<status> <body>`, split on the first space only.
// `success` hands the body back; `failure` is turned into a thrown error.

import { ChannelError, RemoteFailureError } from "./errors.ts";

export const RESPONSE_SUCCESS = "success";
export const RESPONSE_FAILURE = "failure";

/** Failure body the server sends when a command ran past its timeout. */
export const TIMEOUT_SENTINEL = "<timeout>";

export type ResponseStatus = typeof RESPONSE_SUCCESS | typeof RESPONSE_FAILURE;

export interface StatusLine {
  status: ResponseStatus;
  body: string;
}

/**
 * Split a response into its status and body without interpreting the status.
 *
 * @throws ChannelError (`protocol_violation`) if there is no space or the status is unknown
 */
export function parseStatusLine(response: string): StatusLine {
  const space = response.indexOf(" ");
  if (space < 0) {
    throw ChannelError.protocol(`response has no status separator: ${JSON.stringify(preview(response))}`);
  }

  const status = response.slice(0, space);
  const body = response.slice(space + 1);
  if (status !== RESPONSE_SUCCESS && status !== RESPONSE_FAILURE) {
    throw ChannelError.protocol(`unknown response status ${JSON.stringify(preview(status))}`);
  }
  return { status, body };
}

/**
 * Decode a response payload.
 *
 * @returns the body of a `success` response, unchanged
 * @throws ChannelError (`remote_timeout`) for `failure <timeout>`
 * @throws RemoteFailureError for any other `failure` body
 * @throws ChannelError (`protocol_violation`) for a malformed status line
 */
export function decodeResponse(response: string): string {
  const { status, body } = parseStatusLine(response);

  if (status === RESPONSE_FAILURE) {
    if (body === TIMEOUT_SENTINEL) {
      throw ChannelError.remoteTimeout();
    }
    throw new RemoteFailureError(body);
  }
  return body;
}

function preview(text: string): string {
  return text.length > 64 ? `${text.slice(0, 64)}...` : text;
}
