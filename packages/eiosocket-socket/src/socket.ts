import {
  PingTimeoutError,
  ProtocolError,
  SocketClosedError,
  SocketConnectedError,
  toError,
} from "./errors";
import { CustomEventTarget } from "./event-target";
import { DialErrorContext } from "./events";
import {
  decodeHandshake,
  decodePacket,
  encodePacket,
  type Handshake,
  type Packet,
} from "./packet";
import type { Frame, FramedConnection, Transport } from "./transport";
import { buildUrl, timeoutPromise } from "./utils";
import { WebSocketTransport } from "./websocket";

export type Status = "closed" | "opening" | "connected";

export interface SocketEventMap {
  connect: undefined;
  disconnect: Error | undefined;
  dialError: DialErrorContext;
  reconnect: undefined;
  pong: string;
  binary: Uint8Array;
  message: string;

  //debug, raw text frames
  recv: string;
  send: string;

  statusChange: Status;
}

export type SocketOptions = {
  secure?: boolean;
  path?: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;

  //connection related
  dialTimeout?: number;
  closeTimeout?: number;
  transport?: Transport;

  //retries related
  minReconnectionDelay?: number;
  maxReconnectionDelay?: number;
  reconnectionDelayGrowFactor?: number;
  //overrides the three above
  getDelay?: (retryCount: number) => number;

  //debug
  debug?: boolean;
  debugLogger?: (...args: unknown[]) => void;
};

export const DEFAULT = {
  path: "/engine.io/",
  dialTimeout: 0, //no timeout
  closeTimeout: 3000,
  minReconnectionDelay: 1000,
  maxReconnectionDelay: 5 * 60 * 1000,
  reconnectionDelayGrowFactor: 2,
};

type Attempt = {
  generation: number;
  controller: AbortController;
  conn: FramedConnection | null;
  open: boolean;
  pingTimer?: ReturnType<typeof setTimeout>;
  closeTimer?: ReturnType<typeof setTimeout>;
};

type ReconnectTimer = {
  token: number;
  timeout: ReturnType<typeof setTimeout>;
  cleanup: () => void;
};

export type Message = string | Uint8Array;

export class EngineSocket extends CustomEventTarget<SocketEventMap> {
  private _status: Status = "closed";
  private _url: string;
  private _options: SocketOptions;
  private _transport: Transport;
  private _debugLogger: (...args: unknown[]) => void = console.log.bind(console);

  //every dial gets a new generation, anything spawned by an older one is stale
  private _generation = 0;
  private _attempt: Attempt | null = null;
  private _parentSignal: AbortSignal | undefined;
  private _closeRequested = false;

  private _sid = "";
  private _pingInterval = 0;
  private _pingTimeout = 0;
  private _maxPayload = 0;

  private _reDialCount = 0;
  private _reDialDelay: number;
  private _reconnectToken = 0;
  private _reconnectTimer: ReconnectTimer | undefined;

  private _enqueuedPackets: Packet[] = [];

  constructor(host: string, options: SocketOptions = {}) {
    super();

    this._options = options;
    this._url = buildUrl(host, options);
    this._transport = options.transport ?? new WebSocketTransport();
    this._reDialDelay =
      options.minReconnectionDelay ?? DEFAULT.minReconnectionDelay;

    if (this._options.debugLogger)
      this._debugLogger = this._options.debugLogger;
  }

  get url(): string {
    return this._url;
  }

  get id(): string {
    return this._sid;
  }

  get connected(): boolean {
    return this._status === "connected";
  }

  get pingInterval(): number {
    return this._pingInterval;
  }

  get pingTimeout(): number {
    return this._pingTimeout;
  }

  get maxPayload(): number {
    return this._maxPayload;
  }

  get retryCount(): number {
    return this._reDialCount;
  }

  //aborted, with the disconnect cause as reason, when the current connection ends
  get signal(): AbortSignal | undefined {
    return this._attempt?.controller.signal;
  }

  getStatus = (): Status => this._status;

  private _setStatus(status: Status) {
    if (this._status === status) return;

    this._debug(`[status] `, this._status, " -> ", status);
    this._status = status;
    this.dispatchEvent("statusChange", status);
  }

  private _getNextDelay(): number {
    if (typeof this._options.getDelay === "function") {
      return this._options.getDelay(this._reDialCount);
    }

    const {
      maxReconnectionDelay = DEFAULT.maxReconnectionDelay,
      reconnectionDelayGrowFactor = DEFAULT.reconnectionDelayGrowFactor,
    } = this._options;

    const delay = this._reDialDelay;
    this._reDialDelay = Math.min(
      delay * reconnectionDelayGrowFactor,
      maxReconnectionDelay
    );
    return delay;
  }

  private _resetDelay() {
    const { minReconnectionDelay = DEFAULT.minReconnectionDelay } =
      this._options;
    this._reDialDelay = minReconnectionDelay;
  }

  private async _openTransport(attempt: Attempt): Promise<FramedConnection> {
    const { headers = {}, dialTimeout = DEFAULT.dialTimeout } = this._options;
    const { controller } = attempt;

    this._debug(`[dial] `, this._url);

    const pending = this._transport.dial(this._url, {
      headers,
      signal: controller.signal,
    });

    const conn =
      dialTimeout > 0
        ? await timeoutPromise(pending, dialTimeout, "dial timeout", (error) =>
            controller.abort(error)
          )
        : await pending;

    //aborted by close() or the parent signal, but the transport resolved anyway
    if (controller.signal.aborted) {
      conn.close();
      throw toError(controller.signal.reason);
    }

    return conn;
  }

  private async _dial(): Promise<void> {
    const parent = this._parentSignal;
    const generation = ++this._generation;
    const attempt: Attempt = {
      generation,
      controller: new AbortController(),
      conn: null,
      open: false,
    };
    this._attempt = attempt;

    if (parent) {
      if (parent.aborted) {
        attempt.controller.abort(parent.reason);
      } else {
        const onParentAbort = () => {
          if (attempt.conn) {
            this._guard(() => this._onClose(generation, toError(parent.reason)));
          }
          else attempt.controller.abort(parent.reason);
        };
        parent.addEventListener("abort", onParentAbort, { once: true });
        attempt.controller.signal.addEventListener(
          "abort",
          () => parent.removeEventListener("abort", onParentAbort),
          { once: true }
        );
      }
    }

    let conn: FramedConnection;
    try {
      if (attempt.controller.signal.aborted) {
        throw toError(attempt.controller.signal.reason);
      }
      conn = await this._openTransport(attempt);
    } catch (error) {
      if (this._attempt === attempt) this._attempt = null;
      attempt.controller.abort(error);
      throw error;
    }

    attempt.conn = conn;
    this._reDialCount = 0;
    this._resetDelay();

    this._reader(attempt, conn).catch((error: unknown) => {
      //a listener threw inside the loop, or while it tore the connection down
      if (this._attempt === attempt) {
        this._guard(() => this._onClose(generation, toError(error)));
      } else {
        this._reportListenerError(error);
      }
    });
  }

  async dial(signal?: AbortSignal): Promise<void> {
    if (this._status !== "closed") throw new SocketConnectedError();

    this._parentSignal = signal;
    this._closeRequested = false;

    try {
      //status flips before statusChange listeners run, so concurrent dials can't both win
      this._setStatus("opening");
      await this._dial();
    } catch (error) {
      const err = toError(error);
      this._debug(`[dial error] `, err.message);
      this._setStatus("closed");
      this.dispatchEvent("dialError", new DialErrorContext(-1, err));
      throw err;
    }
  }

  //resolves with the failure context, or null once connected
  private async _reDial(): Promise<DialErrorContext | null> {
    if (this._status !== "closed") throw new SocketConnectedError();

    try {
      this._setStatus("opening");
      await this._dial();
    } catch (error) {
      this._reDialCount++;

      const context = new DialErrorContext(this._reDialCount, toError(error));
      this._debug(`[redial error] `, context.count, context.error.message);
      //the chain only stops through cancelReDial()
      this._guard(() => this._setStatus("closed"));
      this._guard(() => this.dispatchEvent("dialError", context));
      return context;
    }

    this.dispatchEvent("reconnect", undefined);
    return null;
  }

  private _cancelReconnect() {
    const timer = this._reconnectTimer;
    if (!timer) return;

    this._reconnectTimer = undefined;
    clearTimeout(timer.timeout);
    timer.cleanup();
  }

  private _nextReconnect() {
    this._cancelReconnect();

    const parent = this._parentSignal;
    if (parent?.aborted || this._closeRequested) return;

    const delay = this._getNextDelay();
    const token = ++this._reconnectToken;
    const onParentAbort = () => this._cancelReconnect();

    this._debug(`[reconnect] scheduled in `, delay);

    parent?.addEventListener("abort", onParentAbort, { once: true });
    const timeout = setTimeout(() => {
      if (this._reconnectTimer?.token !== token) return;
      this._reconnectTimer = undefined;
      parent?.removeEventListener("abort", onParentAbort);

      this._reDial().then(
        (context) => {
          if (!context || context.reDialCanceled) return;
          if (this._status !== "closed") return;
          this._nextReconnect();
        },
        (error: unknown) => {
          if (error instanceof SocketConnectedError) {
            //someone dialed in the meantime
            this._debug(`[reconnect] skipped, `, error.message);
            return;
          }
          //a reconnect listener threw, the connection itself is up
          this._reportListenerError(error);
        }
      );
    }, delay);

    this._reconnectTimer = {
      token,
      timeout,
      cleanup: () => parent?.removeEventListener("abort", onParentAbort),
    };
  }

  private _onClose(generation: number, error?: Error) {
    const attempt = this._attempt;
    if (this._status === "closed") return;
    if (!attempt || attempt.generation !== generation) return;

    //a close() in flight turns whatever ends the stream into a clean disconnect
    const cause = this._closeRequested ? undefined : error;

    this._debug(`[close] `, cause ? cause.message : "clean");

    const previous = this._status;
    this._attempt = null;
    this._status = "closed";
    attempt.conn?.close();
    attempt.controller.abort(cause ?? new SocketClosedError());

    //scheduled before any listener runs, a throwing listener can't lose it
    if (cause) this._nextReconnect();

    try {
      this._debug(`[status] `, previous, " -> ", "closed");
      this.dispatchEvent("statusChange", "closed");
    } finally {
      this.dispatchEvent("disconnect", cause);
    }
  }

  //for timers and write callbacks, where no caller is left to hand a listener's error to
  private _guard(fn: () => void) {
    try {
      fn();
    } catch (error) {
      this._reportListenerError(error);
    }
  }

  private _reportListenerError(error: unknown) {
    this._debug(`[listener error] `, toError(error).message);
    console.error("socket listener failed", error);
  }

  private _resetPingTimer(attempt: Attempt) {
    if (!attempt.open) return;

    clearTimeout(attempt.pingTimer);
    attempt.pingTimer = setTimeout(() => {
      this._guard(() =>
        this._onClose(attempt.generation, new PingTimeoutError())
      );
    }, this._pingInterval + this._pingTimeout);
  }

  private async _reader(attempt: Attempt, conn: FramedConnection) {
    const { generation } = attempt;

    for (;;) {
      let frame: Frame;
      try {
        frame = await conn.next();
      } catch (error) {
        this._onClose(generation, toError(error));
        return;
      }

      if (this._attempt !== attempt) return;

      //any traffic counts as liveness
      this._resetPingTimer(attempt);

      if (frame.kind === "binary") {
        this.dispatchEvent("binary", frame.data);
        continue;
      }

      this.dispatchEvent("recv", frame.data);

      let packet: Packet;
      try {
        packet = decodePacket(frame.data);
      } catch (error) {
        this._onClose(generation, toError(error));
        return;
      }

      if (!this._handlePacket(attempt, conn, packet)) return;
    }
  }

  //false once the connection is gone
  private _handlePacket(
    attempt: Attempt,
    conn: FramedConnection,
    packet: Packet
  ): boolean {
    switch (packet.type) {
      case "binary": {
        this.dispatchEvent("binary", packet.data);
        return true;
      }

      case "open": {
        if (this._status !== "opening") {
          this._onClose(
            attempt.generation,
            new ProtocolError("socket was already opened")
          );
          return false;
        }
        this._handshake(attempt, conn, packet.data);
        return this._attempt === attempt;
      }

      case "close": {
        this._onClose(attempt.generation);
        return false;
      }

      case "ping": {
        const pong: Packet = { type: "pong", data: packet.data };
        //straight to the transport once connected, ahead of anything emitted later
        if (this._status === "connected") this._write(attempt, conn, pong);
        else this._enqueuedPackets.push(pong);
        return true;
      }

      case "pong": {
        this.dispatchEvent("pong", packet.data);
        return true;
      }

      case "message": {
        this.dispatchEvent("message", packet.data);
        return true;
      }

      case "noop":
        return true;

      default: {
        this._onClose(
          attempt.generation,
          new ProtocolError(`unsupported packet type ${packet.type}`)
        );
        return false;
      }
    }
  }

  private _handshake(attempt: Attempt, conn: FramedConnection, data: string) {
    let handshake: Handshake;
    try {
      handshake = decodeHandshake(data);
    } catch (error) {
      this._onClose(attempt.generation, toError(error));
      return;
    }

    this._sid = handshake.sid;
    this._pingInterval = handshake.pingInterval;
    this._pingTimeout = handshake.pingTimeout;
    this._maxPayload = handshake.maxPayload;

    //send listeners may emit while this drains, those land at the tail and go out too
    let packet = this._enqueuedPackets.shift();
    while (packet) {
      this._write(attempt, conn, packet);
      if (this._attempt !== attempt) return;
      packet = this._enqueuedPackets.shift();
    }

    this._setStatus("connected");

    attempt.open = true;
    attempt.controller.signal.addEventListener(
      "abort",
      () => clearTimeout(attempt.pingTimer),
      { once: true }
    );
    this._resetPingTimer(attempt);

    this._debug(`[handshake] `, this._sid);
    this.dispatchEvent("connect", undefined);
  }

  private _write(attempt: Attempt, conn: FramedConnection, packet: Packet) {
    const frame = encodePacket(packet);

    conn.write(frame).catch((error: unknown) => {
      this._guard(() => this._onClose(attempt.generation, toError(error)));
    });

    if (frame.kind === "text") this.dispatchEvent("send", frame.data);
  }

  private _send(packet: Packet): boolean {
    const attempt = this._attempt;
    if (
      this._status !== "connected" ||
      this._closeRequested ||
      !attempt?.conn
    ) {
      this._enqueuedPackets.push(packet);
      return false;
    }

    this._write(attempt, attempt.conn, packet);
    return true;
  }

  private _debug(...args: unknown[]) {
    if (this._options.debug) {
      this._debugLogger("EIO>", ...args);
    }
  }

  //we're returning a boolean here, false means the message waits for the next handshake
  emit(data: Message): boolean {
    if (typeof data === "string") {
      return this._send({ type: "message", data });
    }
    return this._send({ type: "binary", data });
  }

  close(): void {
    this._cancelReconnect();
    this._closeRequested = true;

    const attempt = this._attempt;
    if (this._status === "closed" || !attempt) return;

    //handshake still pending
    if (this._status === "opening") {
      if (attempt.conn) this._onClose(attempt.generation);
      else attempt.controller.abort(new SocketClosedError("closed while dialing"));
      return;
    }

    //already asked the server
    if (attempt.closeTimer || !attempt.conn) return;

    const { closeTimeout = DEFAULT.closeTimeout } = this._options;
    attempt.closeTimer = setTimeout(() => {
      this._guard(() => this._onClose(attempt.generation));
    }, closeTimeout);
    attempt.controller.signal.addEventListener(
      "abort",
      () => clearTimeout(attempt.closeTimer),
      { once: true }
    );

    this._write(attempt, attempt.conn, { type: "close", data: "" });
  }
}
