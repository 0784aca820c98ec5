/**
 * Confidence-scored envelope shared by classifier tiers and field extractors.
 * `confidence` is always clamped into [0, 1].
 */
export interface Scored<T, S extends string = string> {
  value: T;
  confidence: number;
  tier: S;
  evidence: string;
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  if (value >= 1) {
    return 1;
  }
  return Number(value.toFixed(4));
}

export function scored<T, S extends string>(value: T, confidence: number, tier: S, evidence: string): Scored<T, S> {
  return { value, confidence: clampConfidence(confidence), tier, evidence };
}

/** Earlier candidates win ties. */
export function pickHighest<C extends { confidence: number }>(candidates: readonly C[]): C | undefined {
  let best: C | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.confidence > best.confidence) {
      best = candidate;
    }
  }
  return best;
}

export function compareLexically(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
