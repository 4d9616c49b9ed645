import type { AppConfig } from "./config";
import { extractMibFeatures } from "./mib";
import {
  ModelServiceClient,
  type FetchLike,
  type RemoteScorer,
} from "./model-service";
import { extractRxFeatures } from "./rx";
import type {
  CombinedFeatures,
  MibFeatures,
  PredictionResult,
  PredictRequest,
  RiskLevel,
  RxFeatures,
  ScoredRisk,
} from "./types";

/**
 * Declared size of the combined feature vector, reported with every result.
 *
 * This is a fixed contract with downstream consumers and is never derived
 * from the mapping at response time.
 */
export const FEATURE_COUNT = 105;

export const HIGH_RISK_THRESHOLD = 0.6;
export const MEDIUM_RISK_THRESHOLD = 0.3;

/**
 * Merges the two vocabularies into one flat mapping.
 */
export function combineFeatures(
  mib: MibFeatures,
  rx: RxFeatures
): CombinedFeatures {
  return { ...mib, ...rx };
}

/**
 * Rule-based risk score in [0, 1].
 *
 * Every term is non-negative, so no indicator can lower the score. Keys
 * missing from `features` read as 0 / false.
 */
export function ruleBasedRiskScore(features: Partial<CombinedFeatures>): number {
  const f = features;
  let score = 0;

  // MIB factors
  score += (f.mib_hit_count ?? 0) * 0.15;
  score += Math.min(0.15, (f.mib_code_count ?? 0) * 0.025);
  score += f.mib_bmi_over_35 ? 0.1 : 0;
  score += f.mib_has_cardiac_code ? 0.1 : 0;
  score += f.mib_has_cancer_code ? 0.15 : 0;
  score += f.mib_has_substance_abuse_code ? 0.12 : 0;

  // RX factors
  score += Math.min(0.15, (f.rx_total_fills ?? 0) * 0.02);
  score += Math.min(0.12, (f.rx_unique_drugs ?? 0) * 0.02);
  score += f.rx_drug_opioid ? 0.15 : 0;
  score += f.rx_drug_benzo ? 0.1 : 0;
  score += f.rx_drug_insulin ? 0.12 : 0;

  // High-risk combinations
  score += f.flag_opioid_and_benzo ? 0.25 : 0;
  score += f.flag_high_risk_combo ? 0.15 : 0;
  score += f.flag_polypharmacy_10 ? 0.1 : 0;

  return Math.min(1.0, score);
}

/**
 * Maps a score to a risk level. Both thresholds are inclusive.
 */
export function classifyRisk(score: number): RiskLevel {
  if (score >= HIGH_RISK_THRESHOLD) return "HIGH";
  if (score >= MEDIUM_RISK_THRESHOLD) return "MEDIUM";
  return "LOW";
}

/**
 * Which scorer a prediction should use. The remote variant always carries
 * the client it calls, so "remote without an endpoint" cannot be expressed.
 */
export type ScoringContext =
  | { strategy: "rule-based" }
  | { strategy: "remote"; modelService: RemoteScorer };

export function createScoringContext(
  config: AppConfig,
  fetchImpl?: FetchLike
): ScoringContext {
  if (config.strategy === "rule-based") return { strategy: "rule-based" };
  return {
    strategy: "remote",
    modelService: new ModelServiceClient({
      url: config.modelServiceUrl,
      timeoutMs: config.modelServiceTimeoutMs,
      fetchImpl,
    }),
  };
}

/**
 * Scores a feature mapping with the context's strategy.
 *
 * A failed remote call is logged and replaced by the rule-based score; the
 * returned `modelVersion` says which path produced the number.
 */
export async function computeRiskScore(
  features: Partial<CombinedFeatures>,
  ctx: ScoringContext
): Promise<ScoredRisk> {
  if (ctx.strategy === "rule-based") {
    return { score: ruleBasedRiskScore(features), modelVersion: "rule-based" };
  }

  const remote = await ctx.modelService.predict(features);
  if (remote.ok) {
    return { score: remote.score, modelVersion: "remote-model" };
  }

  console.warn(
    `Model service error: ${remote.reason}, using rule-based fallback`
  );
  return { score: ruleBasedRiskScore(features), modelVersion: "rule-based" };
}

/**
 * Full pipeline for one policy: extract, combine, score, classify.
 *
 * Absent documents yield default features; the only step that can wait is
 * the remote call, which is bounded by the client's timeout.
 */
export async function predictRisk(
  request: PredictRequest,
  ctx: ScoringContext
): Promise<PredictionResult> {
  const start = performance.now();

  const mib = Object.freeze(extractMibFeatures(request.mibXml));
  const rx = Object.freeze(extractRxFeatures(request.rxXml));
  const combined = Object.freeze(combineFeatures(mib, rx));

  const { score, modelVersion } = await computeRiskScore(combined, ctx);

  return Object.freeze({
    policyNumber: request.policyNumber,
    riskScore: score,
    riskLevel: classifyRisk(score),
    modelVersion,
    inferenceMs: performance.now() - start,
    featureCount: FEATURE_COUNT,
    features: Object.freeze({ mib, rx }),
    combined,
  });
}
