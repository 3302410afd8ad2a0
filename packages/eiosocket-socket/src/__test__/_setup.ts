import type {
  DialOptions,
  Frame,
  FramedConnection,
  Transport,
} from "../transport";

export const HANDSHAKE = `0${JSON.stringify({
  sid: "test-sid",
  upgrades: [],
  pingInterval: 25000,
  pingTimeout: 20000,
  maxPayload: 1000000,
})}`;

//lets pending promise chains settle, works with fake timers too
export async function tick() {
  for (let i = 0; i < 25; i++) await Promise.resolve();
}

export class MockConnection implements FramedConnection {
  written: Frame[] = [];
  closed = false;
  writeError: Error | null = null;

  private _frames: Frame[] = [];
  private _waiter: {
    resolve: (frame: Frame) => void;
    reject: (error: Error) => void;
  } | null = null;
  private _ended: Error | null = null;

  //text frames written so far
  get sent(): string[] {
    return this.written.flatMap((frame) =>
      frame.kind === "text" ? [frame.data] : []
    );
  }

  receive(frame: Frame) {
    const waiter = this._waiter;
    if (waiter) {
      this._waiter = null;
      waiter.resolve(frame);
      return;
    }
    this._frames.push(frame);
  }

  receiveText(data: string) {
    this.receive({ kind: "text", data });
  }

  fail(error: Error) {
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
    if (this.writeError) return Promise.reject(this.writeError);
    this.written.push(frame);
    return Promise.resolve();
  }

  close() {
    this.closed = true;
    this.fail(new Error("closed locally"));
  }
}

export class MockTransport implements Transport {
  dials: Array<{ url: string; headers: Record<string, string> }> = [];
  connections: MockConnection[] = [];

  private _failures: Error[] = [];
  private _hang = false;

  failNext(error: Error) {
    this._failures.push(error);
  }

  //the next dials only settle when their signal aborts
  hang() {
    this._hang = true;
  }

  get last(): MockConnection {
    const conn = this.connections[this.connections.length - 1];
    if (!conn) throw new Error("nothing dialed yet");
    return conn;
  }

  dial(url: string, { headers, signal }: DialOptions): Promise<FramedConnection> {
    this.dials.push({ url, headers });

    if (this._hang) {
      return new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(signal.reason), {
          once: true,
        });
      });
    }

    const failure = this._failures.shift();
    if (failure) return Promise.reject(failure);

    const conn = new MockConnection();
    this.connections.push(conn);
    return Promise.resolve(conn);
  }
}
