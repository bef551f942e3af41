import { io, type Socket } from "socket.io-client";
import type { ClientToServerEvents, DigitReply, ErrorReply } from "../server/api/protocol";
import { isErrorReply } from "../server/api/protocol";
import type { DigitFetcher } from "./collate";

type DigitSocket = Socket<Record<string, never>, ClientToServerEvents>;

/**
 * One Socket.IO connection per endpoint, opened lazily; every request is
 * acknowledged within `maxTimeoutMs` or rejected.
 */
export class SocketDigitFetcher {
  private readonly sockets = new Map<string, DigitSocket>();

  constructor(private readonly maxTimeoutMs: number, private readonly path = "/ws") {}

  readonly fetchDigit: DigitFetcher = async (endpoint, index) => {
    const reply: DigitReply | ErrorReply = await this.socketFor(endpoint)
      .timeout(this.maxTimeoutMs)
      .emitWithAck("digit", { index });
    if (isErrorReply(reply)) throw new Error(`${endpoint}: ${reply.error}`);
    return reply.digit;
  };

  private socketFor(endpoint: string): DigitSocket {
    let socket = this.sockets.get(endpoint);
    if (!socket) {
      socket = io(endpoint, { path: this.path, transports: ["websocket"] });
      this.sockets.set(endpoint, socket);
    }
    return socket;
  }

  close(): void {
    for (const socket of this.sockets.values()) socket.disconnect();
    this.sockets.clear();
  }
}
