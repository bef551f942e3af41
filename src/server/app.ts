// ===========================================================================
//  src/server/app.ts   (HTTP + WS façade over the digit service)
// ===========================================================================

import { createServer } from "node:http";
import { Server as IOServer } from "socket.io";

import { loadConfig, type ServerConfig } from "./config";
import { DigitService } from "./core/digit-service";
import { createPrimeSource } from "./core/prime-source";
import { SpigotCalculator } from "./core/spigot";
import { NoopDigitCache, type DigitCache } from "./storage/digit-cache";
import { MemoryDigitCache } from "./storage/memory-digit-cache";
import { buildMetadata } from "./api/digit-request";
import { REST_ROOT, createHttpApp } from "./api/http";
import { WS_PATH, attachDigitChannel } from "./api/socket";
import type { ClientToServerEvents } from "./api/protocol";
import {
  logger,
  createLogger,
  startupLogger,
  logError,
  logPerformance
} from "./utils/logger";

const startTime = Date.now();

async function createCache(config: ServerConfig): Promise<DigitCache> {
  switch (config.cache) {
    case "memory":
      return new MemoryDigitCache(config.memoryCacheSize);
    case "firestore": {
      // firebase-admin initialises on import; only load it when asked to
      const { FirestoreDigitCache } = await import("./storage/firestore-digit-cache");
      return FirestoreDigitCache.create({
        collection: config.firestoreCollection,
        timeoutMs: config.cacheTimeoutMs,
      });
    }
    case "none":
      return new NoopDigitCache();
  }
}

try {
  const config = loadConfig();
  startupLogger.info({
    ...config,
    REST_ROOT,
    WS_PATH,
    NODE_ENV: process.env.NODE_ENV,
  }, "Starting pi digit server");

  // ────────────────  Instantiate domain objects  ────────────────────────────
  const cache = await createCache(config);
  const calculator = new SpigotCalculator({
    primeSource: createPrimeSource(config.primeSource, config.millerRabinRounds),
    logger: createLogger("spigot"),
  });
  const service = new DigitService({ calculator, cache });
  const metadata = buildMetadata(config.tags, config.annotations);

  startupLogger.info({
    cache: cache.name,
    primeSource: calculator.primeSource.name,
    identity: metadata.identity,
  }, "Digit service initialized");

  // ────────────────  Express / REST + WebSocket  ────────────────────────────
  const app = createHttpApp({ service, metadata });
  const http = createServer(app);

  const io = new IOServer<ClientToServerEvents>(http, {
    path: WS_PATH,
    cors: { origin: "*" },
    serveClient: false,
    pingInterval: 25_000,
    pingTimeout: 20_000,
  });
  attachDigitChannel(io, service, metadata);

  // ────────────────  Startup  ───────────────────────────────────────────────
  http.listen(config.httpPort, () => {
    logPerformance(startupLogger, "server-startup", startTime);
    startupLogger.info({
      port: config.httpPort,
      wsPath: WS_PATH,
      restRoot: REST_ROOT,
    }, `Server listening on port ${config.httpPort}`);
  });

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down gracefully");
    // closes the HTTP server as well
    io.close().then(
      () => {
        logger.info("Cleanup completed successfully");
        process.exit(0);
      },
      (error: unknown) => {
        logError(logger, error, { context: "shutdown" });
        process.exit(1);
      },
    );
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

} catch (error) {
  logError(startupLogger, error, { context: "startup-failure" });
  process.exit(1);
}
