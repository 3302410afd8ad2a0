import { describe, it, expect } from "vitest";
import React from "react";
import { renderToString } from "react-dom/server";
import { createSocketContext } from "../react";
import { MockTransport } from "./_setup";

describe("react bindings", () => {
  it("should render the socket status inside a provider", () => {
    const transport = new MockTransport();
    const { SocketProvider, useStatus, useSocket } = createSocketContext({
      host: "example.com",
      options: { transport },
    });

    function Status() {
      const socket = useSocket();
      const status = useStatus();
      return <span>{`${status}:${socket.url}`}</span>;
    }

    const html = renderToString(
      <SocketProvider>
        <Status />
      </SocketProvider>
    );

    expect(html).toBe(
      "<span>closed:wss://example.com/engine.io/?EIO=4&amp;transport=websocket</span>"
    );
    //effects don't run on the server
    expect(transport.dials.length).toBe(0);
  });

  it("should throw when used outside the provider", () => {
    const { useStatus } = createSocketContext({ host: "example.com" });

    function Orphan() {
      return <span>{useStatus()}</span>;
    }

    expect(() => renderToString(<Orphan />)).toThrow(
      "accessing socket before initialization"
    );
  });
});
