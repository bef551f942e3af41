import type { Server as IOServer } from "socket.io";

import type { DigitService } from "../core/digit-service";
import { errorReply, serveDigit, statusFor } from "./digit-request";
import type { ClientToServerEvents, DigitMetadata, DigitReply, ErrorReply } from "./protocol";
import { logError, wsLogger, type Logger } from "../utils/logger";

export const WS_PATH = "/ws";

/** Answer one `digit` request; never rejects. */
export async function handleDigitRequest(
  service: DigitService,
  metadata: DigitMetadata,
  payload: unknown,
  logger: Logger = wsLogger,
): Promise<DigitReply | ErrorReply> {
  const raw = typeof payload === "object" && payload !== null && "index" in payload ? payload.index : undefined;
  try {
    return await serveDigit(service, metadata, raw);
  } catch (error) {
    if (statusFor(error) >= 500) logError(logger, error, { index: String(raw) });
    return errorReply(error);
  }
}

/** Wire the request/acknowledge `digit` event onto every connection. */
export function attachDigitChannel(
  io: IOServer<ClientToServerEvents>,
  service: DigitService,
  metadata: DigitMetadata,
  logger: Logger = wsLogger,
): void {
  io.on("connection", socket => {
    logger.info({
      socketId: socket.id,
      remoteAddress: socket.handshake.address,
    }, "Socket connected");

    socket.on("digit", (request, ack) => {
      if (typeof ack !== "function") {
        logger.warn({ socketId: socket.id }, "Digit request without acknowledgement dropped");
        return;
      }
      void handleDigitRequest(service, metadata, request, logger).then(ack);
    });

    socket.on("disconnect", reason => {
      logger.info({ socketId: socket.id, reason }, "Socket disconnected");
    });
  });
}
