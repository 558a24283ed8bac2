import { Router } from "express";
import { ShopifyDetector } from "../detectors/shopifyDetector";
import { Logger } from "../lib/logger";
import { Confidence, DetectRequestSchema, Verdict } from "../types";

const CONFIDENCE_LABELS: Record<Confidence, string> = {
  high: "High",
  medium: "Medium",
  low: "Low"
};

export function summarizeVerdict(verdict: Verdict): string {
  return verdict.isShopify
    ? `Looks like a Shopify store (confidence: ${verdict.confidence}).`
    : "No Shopify signals found.";
}

export function toDetectResponse(input: string, verdict: Verdict) {
  return {
    input,
    is_shopify: verdict.isShopify,
    confidence: verdict.confidence,
    confidence_label: CONFIDENCE_LABELS[verdict.confidence],
    resolved_url: verdict.resolvedUrl,
    signals: verdict.signals,
    evidence: verdict.evidence,
    summary: summarizeVerdict(verdict)
  };
}

export function createDetectRouter(detector: ShopifyDetector, logger: Logger): Router {
  const router = Router();
  const routeLogger = logger.child("routes");

  router.get("/health", (_request, response) => {
    response.json({ ok: true, timestamp: new Date().toISOString() });
  });

  router.post("/detect", async (request, response, next) => {
    const parsed = DetectRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      routeLogger.warn("detect_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const input = parsed.data.url.trim();
    const controller = new AbortController();
    response.on("close", () => {
      if (!response.writableFinished) {
        controller.abort(new Error("client disconnected"));
      }
    });

    try {
      routeLogger.info("detect_requested", { input });
      const verdict = await detector.detect(input, { signal: controller.signal });
      const body = toDetectResponse(input, verdict);
      routeLogger.info("detect_completed", {
        input,
        is_shopify: body.is_shopify,
        confidence: body.confidence,
        resolved_url: body.resolved_url
      });
      if (controller.signal.aborted) {
        return;
      }
      response.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
