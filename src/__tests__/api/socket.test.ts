/**
 * Tests for the Socket.IO digit channel.
 *
 * The handler is checked directly; one round trip runs a real Socket.IO
 * server on an ephemeral localhost port with SocketDigitFetcher as client.
 */
import { describe, it, expect, afterEach } from "vitest";
import { createServer } from "node:http";
import { Server as IOServer } from "socket.io";
import { WS_PATH, attachDigitChannel, handleDigitRequest } from "../../server/api/socket";
import type { ClientToServerEvents, DigitMetadata } from "../../server/api/protocol";
import { buildMetadata } from "../../server/api/digit-request";
import { DigitService } from "../../server/core/digit-service";
import { MemoryDigitCache } from "../../server/storage/memory-digit-cache";
import { SocketDigitFetcher } from "../../client/socket-fetcher";
import { PI_DIGITS } from "../fixtures";

const metadata: DigitMetadata = { identity: "test-host", tags: [], annotations: {} };

describe("handleDigitRequest", () => {
  const service = new DigitService({ cache: new MemoryDigitCache() });

  it("answers string and number indices", async () => {
    expect(await handleDigitRequest(service, metadata, { index: "10" })).toEqual({ index: "10", digit: 8, metadata });
    expect(await handleDigitRequest(service, metadata, { index: 12 })).toEqual({ index: "12", digit: 7, metadata });
  });

  it("replies with an error for malformed payloads", async () => {
    expect(await handleDigitRequest(service, metadata, {})).toEqual({
      error: 'index "undefined" is not a non-negative decimal integer',
    });
    expect(await handleDigitRequest(service, metadata, { index: "-1" })).toEqual({
      error: 'index "-1" is not a non-negative decimal integer',
    });
  });

  it("asks for a decimal string when a number index is not a safe integer", async () => {
    expect(await handleDigitRequest(service, metadata, { index: 2 ** 53 })).toEqual({
      error: "index 9007199254740992 is not a safe integer, send it as a decimal string",
    });
  });

  it("replies with an error for out-of-range indices", async () => {
    expect(await handleDigitRequest(service, metadata, { index: -1 })).toEqual({
      error: "index -1 is out of range, must be an integer in [0, 9223372036854775807]",
    });
  });
});

describe("buildMetadata", () => {
  it("copies tags and annotations", () => {
    const tags = ["a"];
    const built = buildMetadata(tags, { zone: "z" });
    tags.push("b");
    expect(built.tags).toEqual(["a"]);
    expect(built.annotations).toEqual({ zone: "z" });
    expect(built.identity.length).toBeGreaterThan(0);
  });
});

describe("attachDigitChannel", () => {
  let io: IOServer<ClientToServerEvents> | undefined;
  let fetcher: SocketDigitFetcher | undefined;

  afterEach(async () => {
    fetcher?.close();
    await io?.close();
  });

  it("serves digits over a real socket", async () => {
    const server = createServer();
    io = new IOServer<ClientToServerEvents>(server, { path: WS_PATH, serveClient: false });
    attachDigitChannel(io, new DigitService({ cache: new MemoryDigitCache() }), metadata);
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");

    const client = new SocketDigitFetcher(5_000, WS_PATH);
    fetcher = client;
    const endpoint = `http://127.0.0.1:${address.port}`;
    const digits = await Promise.all([0, 1, 2, 3, 4].map(i => client.fetchDigit(endpoint, i)));
    expect(digits.join("")).toBe(PI_DIGITS.slice(0, 5));
  });
});
