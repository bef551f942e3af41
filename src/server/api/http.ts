import express, { type Express } from "express";
import helmet from "helmet";
import compression from "compression";
import pinoHttp from "pino-http";

import type { DigitService } from "../core/digit-service";
import { hasStats } from "../storage/digit-cache";
import { errorReply, serveDigit, statusFor } from "./digit-request";
import type { DigitMetadata } from "./protocol";
import { httpLogger, logError, type Logger } from "../utils/logger";

export const REST_ROOT = "/api/v2";

export interface HttpAppOptions {
  service: DigitService;
  metadata: DigitMetadata;
  logger?: Logger;
}

export function createHttpApp({ service, metadata, logger = httpLogger }: HttpAppOptions): Express {
  const app = express();

  // HTTP request logging with reduced verbosity
  app.use(pinoHttp({
    logger,
    autoLogging: {
      ignore: req => req.url === "/status",
    },
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return "warn";
      if (res.statusCode >= 500 || err) return "error";
      return "debug";
    },
    serializers: {
      req: (req: { method?: string; url?: string }) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: { statusCode?: number }) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression());

  const router = express.Router();

  router.get("/digit/:index", async (req, res) => {
    // abandon cache work once the client has gone away
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const reply = await serveDigit(service, metadata, req.params.index, controller.signal);
      res.json(reply);
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug({ index: req.params.index }, "Client closed before reply");
        return;
      }
      const status = statusFor(error);
      if (status >= 500) {
        logError(logger, error, { index: req.params.index });
      } else {
        logger.warn({ index: req.params.index }, "Rejected digit request");
      }
      if (!res.headersSent) {
        res.status(status).json(errorReply(error));
      }
    }
  });

  app.use(REST_ROOT, router);

  // The v1 API is retired
  app.get("/v1/digit/:index", (_req, res) => {
    res.status(410).end();
  });

  // Health / metrics
  app.get("/status", (_req, res) => {
    res.json({
      identity: metadata.identity,
      uptimeSec: Math.floor(process.uptime()),
      cache: service.cache.name,
      primeSource: service.calculator.primeSource.name,
      ...(hasStats(service.cache) ? { cacheStats: service.cache.getStats() } : {}),
    });
  });

  return app;
}
