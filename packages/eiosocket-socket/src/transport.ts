export type Frame =
  | { kind: "text"; data: string }
  | { kind: "binary"; data: Uint8Array };

export interface FramedConnection {
  //rejects with the cause once the stream has ended, and on every call after that
  next(): Promise<Frame>;
  write(frame: Frame): Promise<void>;
  close(): void;
}

export type DialOptions = {
  headers: Record<string, string>;
  signal: AbortSignal;
};

export interface Transport {
  dial(url: string, options: DialOptions): Promise<FramedConnection>;
}
