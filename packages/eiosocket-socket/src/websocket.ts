import WebSocket from "ws";
import { ConnectionClosedError, SocketClosedError, toError } from "./errors";
import type {
  DialOptions,
  Frame,
  FramedConnection,
  Transport,
} from "./transport";

type Waiter = {
  resolve: (frame: Frame) => void;
  reject: (error: Error) => void;
};

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Turns the push-style `ws` events into a pull-style frame stream.
 * Listeners are attached before the socket opens so frames sent right
 * after the upgrade are queued, not dropped.
 */
export class WebSocketConnection implements FramedConnection {
  private _frames: Frame[] = [];
  private _waiter: Waiter | null = null;
  private _ended: Error | null = null;
  private _lastError: Error | null = null;

  constructor(private _socket: WebSocket) {
    _socket.on("message", (data, isBinary) => {
      const buffer = toBuffer(data);
      this._push(
        isBinary
          ? { kind: "binary", data: new Uint8Array(buffer) }
          : { kind: "text", data: buffer.toString("utf8") }
      );
    });

    _socket.on("error", (error) => {
      this._lastError = error;
    });

    _socket.on("close", (code, reason) => {
      this._end(
        this._lastError ?? new ConnectionClosedError(code, reason.toString())
      );
    });
  }

  private _push(frame: Frame) {
    if (this._ended) return;

    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter.resolve(frame);
      return;
    }
    this._frames.push(frame);
  }

  private _end(error: Error) {
    if (this._ended) return;
    this._ended = error;

    const waiter = this._waiter;
    this._waiter = null;
    waiter?.reject(error);
  }

  next(): Promise<Frame> {
    const frame = this._frames.shift();
    if (frame) return Promise.resolve(frame);
    if (this._ended) return Promise.reject(this._ended);

    return new Promise((resolve, reject) => {
      this._waiter = { resolve, reject };
    });
  }

  write(frame: Frame): Promise<void> {
    if (this._ended || this._socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(this._ended ?? new SocketClosedError());
    }

    return new Promise((resolve, reject) => {
      this._socket.send(
        frame.data,
        { binary: frame.kind === "binary" },
        (error) => {
          if (error) reject(error);
          else resolve();
        }
      );
    });
  }

  close() {
    //queued frames are dropped too, the reader must not see anything after a local close
    this._frames = [];
    this._end(new SocketClosedError());
    this._socket.close();
  }
}

export class WebSocketTransport implements Transport {
  dial(url: string, { headers, signal }: DialOptions) {
    return new Promise<FramedConnection>((resolve, reject) => {
      if (signal.aborted) {
        reject(toError(signal.reason));
        return;
      }

      const socket = new WebSocket(url, { headers });
      const connection = new WebSocketConnection(socket);

      const onAbort = () => {
        cleanup();
        socket.terminate();
        reject(toError(signal.reason));
      };
      const onOpen = () => {
        cleanup();
        resolve(connection);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const cleanup = () => {
        signal.removeEventListener("abort", onAbort);
        socket.off("open", onOpen);
        socket.off("error", onError);
      };

      signal.addEventListener("abort", onAbort, { once: true });
      socket.once("open", onOpen);
      socket.once("error", onError);
    });
  }
}
