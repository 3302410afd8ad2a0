import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { IncomingMessage } from "node:http";
import NodeWebSocket, { WebSocketServer } from "ws";
import { EngineSocket } from "../socket";
import { ConnectionClosedError } from "../errors";
import { WebSocketTransport } from "../websocket";

const HANDSHAKE = `0${JSON.stringify({
  sid: "ws-sid",
  upgrades: [],
  pingInterval: 25000,
  pingTimeout: 20000,
  maxPayload: 1000000,
})}`;

let socketServer: WebSocketServer;
let host: string;

function portOf(server: WebSocketServer): number {
  const address = server.address();
  if (typeof address === "string") throw new Error("expected a tcp server");
  return address.port;
}

beforeEach(async () => {
  socketServer = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await new Promise<void>((resolve) => {
    socketServer.once("listening", () => resolve());
  });
  host = `ws://127.0.0.1:${portOf(socketServer)}`;
});

afterEach(() => {
  return new Promise<void>((resolve) => {
    socketServer.clients.forEach((client) => {
      client.terminate();
    });
    socketServer.removeAllListeners();
    socketServer.close(() => {
      resolve();
    });
  });
});

function nextConnection() {
  return new Promise<[NodeWebSocket, IncomingMessage]>((resolve) => {
    socketServer.once("connection", (client, request) =>
      resolve([client, request])
    );
  });
}

function nextMessage(client: NodeWebSocket) {
  return new Promise<string>((resolve) => {
    client.once("message", (data) => resolve(String(data)));
  });
}

describe("websocket transport", () => {
  it("should exchange packets with a server", async () => {
    const socket = new EngineSocket(host, {
      headers: { "x-client": "test-client" },
    });

    const connection = nextConnection();
    expect(socket.emit("hello")).toBe(false);
    await socket.dial();

    const [client, request] = await connection;
    expect(request.url).toBe("/engine.io/?EIO=4&transport=websocket");
    expect(request.headers["x-client"]).toBe("test-client");

    const connected = new Promise<void>((resolve) => socket.once("connect", resolve));
    const greeting = nextMessage(client);
    client.send(HANDSHAKE);
    await connected;

    expect(socket.id).toBe("ws-sid");
    expect(await greeting).toBe("4hello");

    const reply = new Promise<string>((resolve) => socket.once("message", resolve));
    client.send("4world");
    expect(await reply).toBe("world");

    const binary = new Promise<Uint8Array>((resolve) => socket.once("binary", resolve));
    client.send(Buffer.from([1, 2, 3]), { binary: true });
    expect(Array.from(await binary)).toEqual([1, 2, 3]);

    const pong = nextMessage(client);
    client.send("2");
    expect(await pong).toBe("3");

    const closePacket = nextMessage(client);
    const disconnected = new Promise<Error | undefined>((resolve) =>
      socket.once("disconnect", resolve)
    );
    socket.close();
    expect(await closePacket).toBe("1");

    client.close();
    expect(await disconnected).toBeUndefined();
    expect(socket.getStatus()).toBe("closed");
  });

  it("should reject a dial to a closed port", async () => {
    const port = portOf(socketServer);
    await new Promise<void>((resolve) => socketServer.close(() => resolve()));

    const transport = new WebSocketTransport();
    await expect(
      transport.dial(`ws://127.0.0.1:${port}/`, {
        headers: {},
        signal: new AbortController().signal,
      })
    ).rejects.toBeInstanceOf(Error);
  });

  it("should end the frame stream when the server closes", async () => {
    const transport = new WebSocketTransport();
    const connection = nextConnection();
    const conn = await transport.dial(`${host}/`, {
      headers: {},
      signal: new AbortController().signal,
    });
    const [client] = await connection;

    client.send("4queued");
    client.close(4000, "bye");

    expect(await conn.next()).toEqual({ kind: "text", data: "4queued" });
    const error = await conn.next().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionClosedError);
    expect(error).toMatchObject({ code: 4000, reason: "bye" });
  });
});
