export class TimeoutError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "TimeoutError";
  }
}

export class SocketConnectedError extends Error {
  constructor(msg = "socket was already connected") {
    super(msg);
    this.name = "SocketConnectedError";
  }
}

export class SocketClosedError extends Error {
  constructor(msg = "socket was closed") {
    super(msg);
    this.name = "SocketClosedError";
  }
}

//any traffic counts, not only PING packets
export class PingTimeoutError extends Error {
  constructor(msg = "did not receive any packet for a long time") {
    super(msg);
    this.name = "PingTimeoutError";
  }
}

export class ProtocolError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "ProtocolError";
  }
}

export class ConnectionClosedError extends Error {
  constructor(public readonly code: number, public readonly reason: string) {
    super(`connection closed (${code}${reason ? `: ${reason}` : ""})`);
    this.name = "ConnectionClosedError";
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
