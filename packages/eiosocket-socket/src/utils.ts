import { TimeoutError } from "./errors";
import { PROTOCOL } from "./packet";

export const timeoutPromise = <T = unknown>(
  func: Promise<T>,
  timeout: number,
  timeoutErrMsg: string,
  onTimeout?: (error: TimeoutError) => void
): Promise<T> => {
  return new Promise((resolve, reject) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_resolve, _reject) => {
      timeoutId = setTimeout(() => {
        const error = new TimeoutError(timeoutErrMsg);
        onTimeout?.(error);
        _reject(error);
      }, timeout);
    });

    Promise.race([func, timeoutPromise])
      .then((data) => {
        resolve(data);
      })
      .catch((error: unknown) => {
        reject(error);
      })
      .finally(() => {
        clearTimeout(timeoutId);
      });
  });
};

export type UrlOptions = {
  secure?: boolean;
  path?: string;
  query?: Record<string, string>;
};

/**
 * Builds the websocket endpoint for `host`.
 *
 * A scheme on `host` wins over `secure`: `ws://` and `http://` are plain,
 * every other scheme is secure.
 */
export function buildUrl(host: string, options: UrlOptions = {}): string {
  let { secure = true } = options;
  const { path = "/engine.io/", query = {} } = options;

  const schemeEnd = host.indexOf("://");
  if (schemeEnd > 0) {
    const scheme = host.slice(0, schemeEnd);
    host = host.slice(schemeEnd + "://".length);
    secure = !(scheme === "ws" || scheme === "http");
  }

  const params = new URLSearchParams(query);
  params.set("EIO", String(PROTOCOL));
  params.set("transport", "websocket");
  params.sort();

  const url = new URL(`${secure ? "wss" : "ws"}://${host}`);
  url.pathname = path;
  url.search = params.toString();

  return url.toString();
}
