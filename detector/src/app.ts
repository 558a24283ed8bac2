import express, { Express, NextFunction, Request, Response } from "express";
import { ShopifyDetector } from "./detectors/shopifyDetector";
import { Logger } from "./lib/logger";
import { createDetectRouter } from "./routes/detectRoutes";

export function createApp(detector: ShopifyDetector, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "16kb" }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      logger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.use("/", createDetectRouter(detector, logger));

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "internal server error";
    logger.error("unhandled_error", { error });
    response.status(500).json({ error: message });
  });

  return app;
}
