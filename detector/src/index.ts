import { createApp } from "./app";
import { config } from "./config";
import { ShopifyDetector } from "./detectors/shopifyDetector";
import { Logger } from "./lib/logger";

const logger = new Logger("detector", config.LOG_LEVEL);

const detector = new ShopifyDetector(
  {
    runtime: { timeoutMs: config.REQUEST_TIMEOUT_MS, userAgent: config.USER_AGENT },
    verifyCartOnHeaderMatch: config.VERIFY_CART_ON_HEADER_MATCH
  },
  { logger: logger.child("engine") }
);

const app = createApp(detector, logger);

const server = app.listen(config.PORT, () => {
  logger.info("server_started", {
    port: config.PORT,
    log_level: config.LOG_LEVEL,
    request_timeout_ms: config.REQUEST_TIMEOUT_MS,
    verify_cart_on_header_match: config.VERIFY_CART_ON_HEADER_MATCH
  });
});

const shutdown = (): void => {
  logger.info("shutdown_started");
  server.close(() => {
    logger.info("shutdown_completed");
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
