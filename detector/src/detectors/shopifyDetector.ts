import { verifyCartEndpoint } from "../lib/cart";
import { describeError, FetchRuntimeConfig, probeUrl, ProbeFailure, RequestOptions } from "../lib/http";
import { Logger, silentLogger } from "../lib/logger";
import { extractSignals } from "../lib/platform";
import { DEFAULT_DETECTION_PROFILE, DetectionProfile } from "../lib/profile";
import { normalizeCandidates } from "../lib/url";
import { CartCheckResult, Confidence, ProbeResult, Signal, SignalKind, Verdict } from "../types";

export type Prober = (url: string, options: RequestOptions) => Promise<ProbeResult>;
export type CartVerifier = (baseUrl: string, options: RequestOptions) => Promise<CartCheckResult>;

export interface DetectorSettings {
  runtime: FetchRuntimeConfig;
  profile?: DetectionProfile;
  verifyCartOnHeaderMatch?: boolean;
}

export interface DetectorDeps {
  logger?: Logger;
  probe?: Prober;
  verifyCart?: CartVerifier;
}

export interface DetectOptions {
  signal?: AbortSignal;
}

type DecisionRule = "header" | "cart_endpoint" | "cookie_and_marker" | "cookie_or_marker";

type DetectionState =
  | { kind: "try_next_candidate"; remaining: string[] }
  | { kind: "decided"; verdict: Verdict };

interface DetectionRun {
  input: string;
  evidence: string[];
  signal?: AbortSignal;
}

export const INPUT_ERROR_NOTE = "No usable hostname in input";
export const CANCELLED_NOTE = "Detection cancelled";

function freezeVerdict(
  isShopify: boolean,
  confidence: Confidence,
  resolvedUrl: string | null,
  evidence: string[],
  signals: SignalKind[]
): Verdict {
  return Object.freeze({
    isShopify,
    confidence,
    resolvedUrl,
    evidence: Object.freeze([...evidence]),
    signals: Object.freeze([...signals])
  });
}

function negativeVerdict(evidence: string[]): Verdict {
  return freezeVerdict(false, "low", null, evidence, []);
}

export class ShopifyDetector {
  private readonly profile: DetectionProfile;
  private readonly verifyCartOnHeaderMatch: boolean;
  private readonly logger: Logger;
  private readonly probe: Prober;
  private readonly verifyCart: CartVerifier;

  constructor(settings: DetectorSettings, deps: DetectorDeps = {}) {
    this.profile = settings.profile ?? DEFAULT_DETECTION_PROFILE;
    this.verifyCartOnHeaderMatch = settings.verifyCartOnHeaderMatch ?? true;
    this.logger = deps.logger ?? silentLogger;
    this.probe = deps.probe ?? ((url, options) => probeUrl(url, settings.runtime, options));
    this.verifyCart =
      deps.verifyCart ?? ((baseUrl, options) => verifyCartEndpoint(baseUrl, settings.runtime, this.profile, options));
  }

  /**
   * Walks the candidates for `input` in order and stops at the first one that yields a
   * decision. Network and input problems become evidence notes; this never rejects for them.
   */
  async detect(input: string, options: DetectOptions = {}): Promise<Verdict> {
    const candidates = normalizeCandidates(input);
    this.logger.info("detection_started", { input, candidates });

    const run: DetectionRun = { input, evidence: [], signal: options.signal };
    if (candidates.length === 0) {
      this.logger.warn("input_rejected", { input });
      run.evidence.push(INPUT_ERROR_NOTE);
      return negativeVerdict(run.evidence);
    }

    let state: DetectionState = { kind: "try_next_candidate", remaining: candidates };
    while (state.kind === "try_next_candidate") {
      state = await this.step(state.remaining, run);
    }
    return state.verdict;
  }

  private async step(remaining: string[], run: DetectionRun): Promise<DetectionState> {
    const [candidate, ...rest] = remaining;
    if (candidate === undefined) {
      this.logger.info("decision", { input: run.input, is_shopify: false, confidence: "low" });
      return { kind: "decided", verdict: negativeVerdict(run.evidence) };
    }
    if (run.signal?.aborted) {
      this.logger.info("detection_cancelled", { input: run.input, next_candidate: candidate });
      run.evidence.push(CANCELLED_NOTE);
      return { kind: "decided", verdict: negativeVerdict(run.evidence) };
    }

    const verdict = await this.evaluateCandidate(candidate, run);
    return verdict ? { kind: "decided", verdict } : { kind: "try_next_candidate", remaining: rest };
  }

  private async evaluateCandidate(candidate: string, run: DetectionRun): Promise<Verdict | null> {
    const requestOptions: RequestOptions = { logger: this.logger, signal: run.signal };

    let probe: ProbeResult;
    try {
      probe = await this.probe(candidate, requestOptions);
    } catch (error) {
      const reason = error instanceof ProbeFailure ? error.reason : describeError(error);
      run.evidence.push(`Could not open ${candidate}: ${reason}`);
      return null;
    }

    const finalUrl = probe.finalUrl;
    const { header, cookie, bodyMarker } = extractSignals(probe, this.profile);

    if (header) {
      this.recordSignal(run, header);
      const found: SignalKind[] = ["header"];
      if (this.verifyCartOnHeaderMatch) {
        const cart = await this.verifyCart(finalUrl, requestOptions);
        run.evidence.push(cart.ok ? cart.signal.description : cart.reason);
        if (cart.ok) {
          found.push("cart_endpoint");
        }
      }
      return this.decide("header", "high", finalUrl, run, found);
    }

    const found: Signal[] = [];
    for (const extracted of [cookie, bodyMarker]) {
      if (extracted) {
        this.recordSignal(run, extracted);
        found.push(extracted);
      }
    }
    const foundKinds = found.map((signal) => signal.kind);

    const cart = await this.verifyCart(finalUrl, requestOptions);
    if (cart.ok) {
      this.recordSignal(run, cart.signal);
      return this.decide("cart_endpoint", "high", finalUrl, run, [...foundKinds, "cart_endpoint"]);
    }

    if (cookie && bodyMarker) {
      run.evidence.push(cart.reason);
      return this.decide("cookie_and_marker", "high", finalUrl, run, foundKinds);
    }
    if (cookie || bodyMarker) {
      run.evidence.push(cart.reason);
      return this.decide("cookie_or_marker", "medium", finalUrl, run, foundKinds);
    }

    run.evidence.push(`No Shopify signals on ${finalUrl}`);
    this.logger.info("candidate_without_signals", { candidate, final_url: finalUrl });
    return null;
  }

  private recordSignal(run: DetectionRun, signal: Signal): void {
    run.evidence.push(signal.description);
    this.logger.info("signal_found", { input: run.input, kind: signal.kind, matches: signal.matches });
  }

  private decide(
    rule: DecisionRule,
    confidence: Confidence,
    resolvedUrl: string,
    run: DetectionRun,
    signals: SignalKind[]
  ): Verdict {
    this.logger.info("decision", { input: run.input, rule, is_shopify: true, confidence, resolved_url: resolvedUrl });
    return freezeVerdict(true, confidence, resolvedUrl, run.evidence, signals);
  }
}
