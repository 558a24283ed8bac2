const SCHEME_PATTERN = /^https?:\/\//i;
const CANDIDATE_SCHEMES = ["https", "http"] as const;

/** Host of the input, lower-cased, keeping a non-default port. */
export function extractHost(input: string): string | null {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return null;
  }

  const host = parsed.host.toLowerCase();
  return parsed.hostname.length > 0 ? host : null;
}

export function counterpartHost(host: string): string {
  return host.startsWith("www.") ? host.slice("www.".length) : `www.${host}`;
}

/**
 * Expands raw user input into the ordered root URLs worth probing: the host as typed, then its
 * www counterpart, each over https before http. Returns an empty list for unusable input.
 */
export function normalizeCandidates(input: string): string[] {
  const host = extractHost(input);
  if (!host) {
    return [];
  }

  const hosts = [host, counterpartHost(host)].filter((variant) => variant.length > 0 && !variant.startsWith(":"));
  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const variant of hosts) {
    for (const scheme of CANDIDATE_SCHEMES) {
      const candidate = `${scheme}://${variant}/`;
      if (!seen.has(candidate)) {
        seen.add(candidate);
        candidates.push(candidate);
      }
    }
  }
  return candidates;
}

export function resolveEndpointUrl(baseUrl: string, path: string): string | null {
  try {
    return new URL(path, baseUrl).toString();
  } catch {
    return null;
  }
}
