import { CartCheckResult, CartPayloadSchema } from "../types";
import { describeError, fetchWithTimeout, FetchRuntimeConfig, RequestOptions } from "./http";
import { silentLogger } from "./logger";
import { DetectionProfile } from "./profile";
import { resolveEndpointUrl } from "./url";

function isJsonContentType(contentType: string): boolean {
  return contentType.trim().toLowerCase().startsWith("application/json");
}

/**
 * Requests the storefront cart endpoint next to `baseUrl`. Every failure, including network
 * errors and malformed JSON, comes back as `{ ok: false }` with a readable reason.
 */
export async function verifyCartEndpoint(
  baseUrl: string,
  runtime: FetchRuntimeConfig,
  profile: DetectionProfile,
  options: RequestOptions = {}
): Promise<CartCheckResult> {
  const logger = options.logger ?? silentLogger;
  const path = profile.cartPath;
  const cartUrl = resolveEndpointUrl(baseUrl, path);
  if (!cartUrl) {
    return { ok: false, url: null, reason: `${path} could not be resolved against ${baseUrl}` };
  }

  let status: number;
  let contentType: string;
  let body: string;
  try {
    logger.info("cart_check", { url: cartUrl });
    const page = await fetchWithTimeout(cartUrl, { method: "GET" }, runtime, options.signal);
    status = page.response.status;
    contentType = page.response.headers.get("content-type")?.toLowerCase() ?? "";
    body = page.body;
  } catch (error) {
    const reason = describeError(error);
    logger.warn("cart_check_failed", { url: cartUrl, reason });
    return { ok: false, url: cartUrl, reason: `${path} error: ${reason}` };
  }

  logger.info("cart_check_response", { url: cartUrl, status, content_type: contentType });
  const notConfirmed = `${path} did not confirm Shopify (status=${status}, type=${contentType})`;
  if (status !== 200 || !isJsonContentType(contentType)) {
    return { ok: false, url: cartUrl, reason: notConfirmed };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    const reason = describeError(error);
    logger.warn("cart_check_invalid_json", { url: cartUrl, reason });
    return { ok: false, url: cartUrl, reason: `${path} returned malformed JSON: ${reason}` };
  }

  const parsed = CartPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, url: cartUrl, reason: notConfirmed };
  }
  const matches = profile.cartKeys.filter((key) => Object.prototype.hasOwnProperty.call(parsed.data, key));
  if (matches.length === 0) {
    return { ok: false, url: cartUrl, reason: notConfirmed };
  }

  return {
    ok: true,
    url: cartUrl,
    signal: {
      kind: "cart_endpoint",
      description: `Reachable ${cartUrl} (valid JSON with Shopify cart keys)`,
      matches
    }
  };
}
