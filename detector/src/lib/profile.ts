export interface BodyMarker {
  id: string;
  pattern: RegExp;
}

/** The fixed vendor fingerprints a detector looks for. */
export interface DetectionProfile {
  headerPrefix: string;
  cookiePrefix: string;
  maxHeaderNames: number;
  maxCookieNames: number;
  bodyMarkers: readonly BodyMarker[];
  cartPath: string;
  cartKeys: readonly string[];
}

export const DEFAULT_DETECTION_PROFILE: Readonly<DetectionProfile> = Object.freeze({
  headerPrefix: "x-shopify-",
  cookiePrefix: "_shopify",
  maxHeaderNames: 5,
  maxCookieNames: 6,
  bodyMarkers: [
    { id: "cdn.shopify.com", pattern: /cdn\.shopify\.com/i },
    { id: "window.Shopify", pattern: /window\.Shopify\b/i },
    { id: "Shopify.theme", pattern: /Shopify\.theme\b/i },
    { id: "shopify-digital-wallet", pattern: /shopify-digital-wallet/i },
    { id: "myshopify.com", pattern: /\bmyshopify\.com\b/i }
  ],
  cartPath: "/cart.js",
  cartKeys: ["items", "token", "attributes"]
});

export function createDetectionProfile(overrides: Partial<DetectionProfile> = {}): DetectionProfile {
  return { ...DEFAULT_DETECTION_PROFILE, ...overrides };
}
