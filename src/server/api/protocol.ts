// Wire shapes shared by the REST router, the Socket.IO channel and the client.

export interface DigitMetadata {
  /** Host that served the digit. */
  identity: string;
  tags: string[];
  annotations: Record<string, string>;
}

export interface DigitRequest {
  /** Decimal string, so indices above 2^53 survive JSON. */
  index: string | number;
}

export interface DigitReply {
  index: string;
  digit: number;
  metadata: DigitMetadata;
}

export interface ErrorReply {
  error: string;
}

export const isErrorReply = (reply: DigitReply | ErrorReply): reply is ErrorReply => "error" in reply;

export interface ClientToServerEvents {
  digit: (request: DigitRequest, ack: (reply: DigitReply | ErrorReply) => void) => void;
}
