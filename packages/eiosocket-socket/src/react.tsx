import React, {
  createContext,
  useContext,
  useEffect,
  useRef,
  useState,
  useSyncExternalStore,
} from "react";
import { Socket, type SocketOptions, type SocketStatus } from "./index";

type Listener<T = void> = (data: T) => void;

interface CreateSocketConfig {
  host: string;
  options?: SocketOptions & { startClosed?: boolean };
}

interface UseSocketOptions {
  onStatusChange?: Listener<SocketStatus>;
  onMessage?: Listener<string>;
  onDisconnect?: Listener<Error | undefined>;
}

//one context per endpoint, providers of the same context share the socket
export const createSocketContext = (config: CreateSocketConfig) => {
  const SocketContext = createContext<Socket | null>(null);

  let counter = 0;
  let initial = true;
  let shared: Socket | null = null;

  const getSocket = () => {
    if (!shared) shared = new Socket(config.host, config.options);
    return shared;
  };

  function SocketProvider(props: { children: React.ReactNode }) {
    const [socket] = useState(getSocket);

    useEffect(() => {
      counter++;

      if (initial && !config.options?.startClosed) {
        initial = false;
        socket.dial().catch((error: unknown) => {
          console.error("socket dial failed", error);
        });
      }

      return () => {
        counter--;

        if (counter < 1) {
          initial = true;
          socket.close();
        }
      };
    }, [socket]);

    return (
      <SocketContext.Provider value={socket}>
        {props.children}
      </SocketContext.Provider>
    );
  }

  function useSocket(listeners?: UseSocketOptions) {
    const socket = useContext(SocketContext);
    const listenersRef = useRef(listeners);

    if (!socket) throw new Error("accessing socket before initialization");

    useEffect(() => {
      listenersRef.current = listeners;
    }, [listeners]);

    useEffect(() => {
      const unsubs: Array<Listener> = [
        socket.on("message", (data) => {
          listenersRef.current?.onMessage?.(data);
        }),
        socket.on("statusChange", (status) => {
          listenersRef.current?.onStatusChange?.(status);
        }),
        socket.on("disconnect", (error) => {
          listenersRef.current?.onDisconnect?.(error);
        }),
      ];

      return () => {
        unsubs.forEach((unsub) => unsub());
      };
    }, [socket]);

    return socket;
  }

  function useStatus() {
    const socket = useSocket();

    const snapshot = socket.getStatus;
    return useSyncExternalStore(
      (notify) => socket.on("statusChange", notify),
      snapshot,
      snapshot
    );
  }

  function useMessage(callback: Listener<string>) {
    const socket = useSocket();
    const ref = useRef(callback);

    useEffect(() => {
      ref.current = callback;
    }, [callback]);

    useEffect(() => socket.on("message", (data) => ref.current(data)), [socket]);
  }

  return {
    SocketProvider,
    useSocket,
    useMessage,
    useStatus,
  };
};
