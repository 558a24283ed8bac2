import { z } from "zod";

export const ConfidenceSchema = z.enum(["high", "medium", "low"]);

export const SignalKindSchema = z.enum(["header", "cookie", "body_marker", "cart_endpoint"]);

export const DetectRequestSchema = z.object({
  url: z.string()
});

// Any JSON object; key checks happen against the detection profile.
export const CartPayloadSchema = z.record(z.string(), z.unknown());

export type Confidence = z.infer<typeof ConfidenceSchema>;
export type SignalKind = z.infer<typeof SignalKindSchema>;

export interface ProbeCookie {
  name: string;
  value: string;
}

export interface ProbeResult {
  requestedUrl: string;
  finalUrl: string;
  status: number;
  headers: Headers;
  cookies: ProbeCookie[];
  body: string;
}

export interface Signal {
  kind: SignalKind;
  description: string;
  matches: string[];
}

export type CartCheckResult =
  | { ok: true; url: string; signal: Signal }
  | { ok: false; url: string | null; reason: string };

export interface Verdict {
  readonly isShopify: boolean;
  readonly confidence: Confidence;
  readonly resolvedUrl: string | null;
  readonly evidence: readonly string[];
  readonly signals: readonly SignalKind[];
}
