import type { RawData } from "../codec/json.js";

export const SOCKET_OPEN = 1;

/** The slice of a `ws` WebSocket the chat server and client rely on. */
export interface SocketLike {
  readonly readyState: number;
  on(event: "open", listener: () => void): unknown;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  send(data: string, cb?: (err?: Error) => void): void;
  close(): void;
}

export function sendText(socket: SocketLike, data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (socket.readyState !== SOCKET_OPEN) {
      reject(new Error("socket is not open"));
      return;
    }
    socket.send(data, (e) => (e ? reject(e) : resolve()));
  });
}
