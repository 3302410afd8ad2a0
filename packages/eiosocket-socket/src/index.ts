export { EngineSocket as Socket, DEFAULT } from "./socket";
export type {
  SocketOptions,
  Status as SocketStatus,
  Message as SocketMessage,
  SocketEventMap,
} from "./socket";
export {
  ConnectionClosedError,
  PingTimeoutError,
  ProtocolError,
  SocketClosedError,
  SocketConnectedError,
  TimeoutError,
} from "./errors";
export { DialErrorContext } from "./events";
export { CustomEventTarget } from "./event-target";
export {
  PROTOCOL,
  decodeHandshake,
  decodePacket,
  encodePacket,
} from "./packet";
export type { Handshake, Packet, PacketType } from "./packet";
export type { DialOptions, Frame, FramedConnection, Transport } from "./transport";
export { WebSocketConnection, WebSocketTransport } from "./websocket";
export { buildUrl } from "./utils";
