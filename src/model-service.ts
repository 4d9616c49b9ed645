/**
 * Client for a remote risk model served behind a row-indexed JSON endpoint.
 * Requires Node 18+ (global fetch).
 */
import { z } from "zod";
import type { CombinedFeatures, RemoteScoreResult } from "./types";

export type FetchLike = (
  input: RequestInfo | URL,
  init?: RequestInit
) => Promise<Response>;

type ModelServiceClientOptions = {
  url: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

/**
 * Anything that can produce a remote score. `ModelServiceClient` is the
 * production implementation; tests substitute their own.
 */
export interface RemoteScorer {
  predict(features: Partial<CombinedFeatures>): Promise<RemoteScoreResult>;
}

/**
 * The feature row the remote model was trained on.
 */
export type ModelFeatureRow = {
  MIB_TOTAL_RECORDS: number;
  MIB_HIT_COUNT: number;
  MIB_HAS_HIT: 0 | 1;
  MIB_AVG_BMI: number;
  RX_TOTAL_FILLS: number;
  RX_UNIQUE_DRUGS: number;
  RX_DRUG_OPIOID: 0 | 1;
  HAS_MIB_EVIDENCE: 0 | 1;
  HAS_RX_EVIDENCE: 0 | 1;
  COMBINED_RISK_SCORE: number;
};

function bit(value: boolean | undefined): 0 | 1 {
  return value ? 1 : 0;
}

export function buildModelFeatureRow(
  features: Partial<CombinedFeatures>
): ModelFeatureRow {
  const records = features.mib_total_records ?? 0;
  const fills = features.rx_total_fills ?? 0;
  return {
    MIB_TOTAL_RECORDS: records,
    MIB_HIT_COUNT: features.mib_hit_count ?? 0,
    MIB_HAS_HIT: bit(features.mib_has_hit),
    MIB_AVG_BMI: features.mib_avg_bmi ?? 0,
    RX_TOTAL_FILLS: fills,
    RX_UNIQUE_DRUGS: features.rx_unique_drugs ?? 0,
    RX_DRUG_OPIOID: bit(features.rx_drug_opioid),
    HAS_MIB_EVIDENCE: bit(records > 0),
    HAS_RX_EVIDENCE: bit(fills > 0),
    // Placeholder column the model expects; not computed upstream.
    COMBINED_RISK_SCORE: 0,
  };
}

const modelOutputSchema = z.object({
  data: z
    .array(
      z
        .tuple([
          z.number(),
          z.union([z.number(), z.object({ output_feature_0: z.number() })]),
        ])
        .rest(z.unknown())
    )
    .min(1),
});

/**
 * Reads the first row's prediction out of a response body.
 *
 * Accepts `{ data: [[i, { output_feature_0: n }]] }` and the bare form
 * `{ data: [[i, n]] }`. Anything else, or a score outside [0, 1], is a
 * failure.
 */
export function parseModelOutput(body: unknown): RemoteScoreResult {
  const parsed = modelOutputSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, reason: "malformed response body" };
  }

  const pred = parsed.data.data[0][1];
  const score = typeof pred === "number" ? pred : pred.output_feature_0;
  if (!(score >= 0 && score <= 1)) {
    return { ok: false, reason: `prediction out of range: ${score}` };
  }
  return { ok: true, score };
}

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ModelServiceClient implements RemoteScorer {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor({ url, timeoutMs = 5000, fetchImpl = fetch }: ModelServiceClientOptions) {
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  /**
   * Scores one feature row. Never throws: transport errors, timeouts,
   * non-2xx statuses and unexpected bodies all come back as `{ ok: false }`.
   */
  async predict(
    features: Partial<CombinedFeatures>
  ): Promise<RemoteScoreResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          accept: "application/json",
        },
        body: JSON.stringify({ data: [[0, buildModelFeatureRow(features)]] }),
      });

      const body = await readJsonResponse(res);
      if (!res.ok) {
        return { ok: false, reason: `HTTP ${res.status} ${res.statusText}`.trim() };
      }
      return parseModelOutput(body);
    } catch (err) {
      if (controller.signal.aborted) {
        return { ok: false, reason: `timed out after ${this.timeoutMs}ms` };
      }
      return { ok: false, reason: describeError(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
