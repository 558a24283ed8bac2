import { ProbeResult, Signal } from "../types";
import { DetectionProfile } from "./profile";

function listWithLimit(names: string[], limit: number): string {
  const shown = names.slice(0, limit).join(", ");
  return names.length > limit ? `${shown}, ...` : shown;
}

export function extractHeaderSignal(probe: ProbeResult, profile: DetectionProfile): Signal | null {
  const prefix = profile.headerPrefix.toLowerCase();
  const names = new Set<string>();
  probe.headers.forEach((_value, key) => {
    if (key.toLowerCase().startsWith(prefix)) {
      names.add(key.toLowerCase());
    }
  });
  if (names.size === 0) {
    return null;
  }

  const matches = [...names];
  return {
    kind: "header",
    description: `Response headers include ${profile.headerPrefix}* (${listWithLimit(matches, profile.maxHeaderNames)})`,
    matches
  };
}

export function extractCookieSignal(probe: ProbeResult, profile: DetectionProfile): Signal | null {
  const prefix = profile.cookiePrefix.toLowerCase();
  const matches = probe.cookies
    .map((cookie) => cookie.name)
    .filter((name) => name.toLowerCase().startsWith(prefix));
  if (matches.length === 0) {
    return null;
  }

  return {
    kind: "cookie",
    description: `Found Shopify cookies: ${listWithLimit(matches, profile.maxCookieNames)}`,
    matches
  };
}

// Global and sticky patterns carry lastIndex between calls; profiles are shared across runs.
function matchesMarker(pattern: RegExp, text: string): boolean {
  if (!pattern.global && !pattern.sticky) {
    return pattern.test(text);
  }
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")).test(text);
}

export function extractBodyMarkerSignal(probe: ProbeResult, profile: DetectionProfile): Signal | null {
  const matches = profile.bodyMarkers
    .filter((marker) => matchesMarker(marker.pattern, probe.body))
    .map((marker) => marker.id);
  if (matches.length === 0) {
    return null;
  }

  return {
    kind: "body_marker",
    description: `Markup contains markers: ${matches.join(", ")}`,
    matches
  };
}

export interface ExtractedSignals {
  header: Signal | null;
  cookie: Signal | null;
  bodyMarker: Signal | null;
}

/** Evaluates every check on one response; none of them short-circuits another. */
export function extractSignals(probe: ProbeResult, profile: DetectionProfile): ExtractedSignals {
  return {
    header: extractHeaderSignal(probe, profile),
    cookie: extractCookieSignal(probe, profile),
    bodyMarker: extractBodyMarkerSignal(probe, profile)
  };
}
