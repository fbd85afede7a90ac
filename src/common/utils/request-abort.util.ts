/** The parts of an Express response used to detect a vanished client. */
export interface DisconnectableResponse {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  readonly req: { readonly socket: { readonly destroyed: boolean } };
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that fires when the client goes away before the response has
 * been written. A normal completion also emits `close`, but by then
 * `writableEnded` is already true. A client that left while the body was
 * still being parsed aborts the signal straight away.
 */
export function abortOnClientDisconnect(res: DisconnectableResponse): AbortSignal {
  const controller = new AbortController();

  if (!res.writableEnded && (res.destroyed || res.req.socket.destroyed)) {
    controller.abort();
    return controller.signal;
  }

  res.once('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
