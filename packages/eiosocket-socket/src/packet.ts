import { z } from "zod";
import { ProtocolError } from "./errors";
import type { Frame } from "./transport";

export const PROTOCOL = 4;

export type PacketType =
  | "open"
  | "close"
  | "ping"
  | "pong"
  | "message"
  | "upgrade"
  | "noop"
  | "binary";

export type Packet =
  | { type: "binary"; data: Uint8Array }
  | { type: Exclude<PacketType, "binary">; data: string };

const PACKET_CODES = {
  open: "0",
  close: "1",
  ping: "2",
  pong: "3",
  message: "4",
  upgrade: "5",
  noop: "6",
} as const;

const PACKET_TYPES: Record<string, Exclude<PacketType, "binary">> = {
  "0": "open",
  "1": "close",
  "2": "ping",
  "3": "pong",
  "4": "message",
  "5": "upgrade",
  "6": "noop",
};

//base64 binary inside a text frame
const BINARY_PREFIX = "b";

const handshakeSchema = z.object({
  sid: z.string(),
  upgrades: z.array(z.string()).default([]),
  pingInterval: z.number().int().nonnegative(),
  pingTimeout: z.number().int().nonnegative(),
  maxPayload: z.number().int().nonnegative().default(1_000_000),
});

export type Handshake = z.infer<typeof handshakeSchema>;

export function encodePacket(packet: Packet): Frame {
  if (packet.type === "binary") {
    return { kind: "binary", data: packet.data };
  }
  return { kind: "text", data: PACKET_CODES[packet.type] + packet.data };
}

export function decodePacket(text: string): Packet {
  if (text.length === 0) throw new ProtocolError("empty packet");

  const code = text.charAt(0);
  const data = text.slice(1);

  if (code === BINARY_PREFIX) {
    return {
      type: "binary",
      data: new Uint8Array(Buffer.from(data, "base64")),
    };
  }

  const type = PACKET_TYPES[code];
  if (!type) throw new ProtocolError(`unknown packet type ${code}`);

  return { type, data };
}

export function decodeHandshake(data: string): Handshake {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    throw new ProtocolError(
      `invalid handshake: ${error instanceof Error ? error.message : error}`
    );
  }

  const result = handshakeSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ProtocolError(
      `invalid handshake: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`
    );
  }
  return result.data;
}
