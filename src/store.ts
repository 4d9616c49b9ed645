import type {
  OnlineFeatureRow,
  PolicyNumber,
  PredictionResult,
  PredictionRow,
} from "./types";

export const MODEL_NAME = "EVIDENCE_RISK_MODEL";

/**
 * Persistence for scored policies: an online feature table keyed by policy
 * number, and an append-only predictions table.
 */
export interface IPredictionStore {
  upsertFeatures(result: PredictionResult, at?: Date): Promise<OnlineFeatureRow>;
  insertPrediction(result: PredictionResult, at?: Date): Promise<PredictionRow>;
  getRecentFeatures(limit?: number): Promise<OnlineFeatureRow[]>;
  getRecentPredictions(limit?: number): Promise<PredictionRow[]>;
}

export function predictionId(policyNumber: PolicyNumber): string {
  return `PRED-${policyNumber}`;
}

/**
 * Projects a prediction onto the online feature table's columns.
 */
export function toOnlineFeatureRow(
  result: PredictionResult,
  createdAt: string
): OnlineFeatureRow {
  const { mib, rx } = result.features;
  return {
    policy_number: result.policyNumber,
    has_mib_data: mib.mib_total_records > 0,
    has_rx_data: rx.rx_total_fills > 0,
    mib_hit_count: mib.mib_hit_count,
    mib_code_count: mib.mib_code_count,
    mib_avg_bmi: mib.mib_avg_bmi,
    mib_max_bmi: mib.mib_max_bmi,
    mib_risk_score: mib.mib_risk_score,
    rx_total_fills: rx.rx_total_fills,
    rx_unique_drugs: rx.rx_unique_drugs,
    rx_unique_specialties: rx.rx_unique_specialties,
    rx_drug_opioid: rx.rx_drug_opioid,
    rx_drug_benzodiazepine: rx.rx_drug_benzo,
    rx_drug_statin: rx.rx_drug_statin,
    rx_drug_insulin: rx.rx_drug_insulin,
    rx_drug_metformin: rx.rx_drug_metformin,
    rx_risk_score: rx.rx_risk_score,
    flag_opioid_and_benzo: rx.flag_opioid_and_benzo,
    flag_polypharmacy_5: rx.flag_polypharmacy_5,
    flag_polypharmacy_10: rx.flag_polypharmacy_10,
    flag_high_risk: rx.flag_high_risk_combo,
    combined_risk_score: result.riskScore,
    feature_created_at: createdAt,
    feature_updated_at: null,
  };
}

/**
 * Newest first; rows written later win ties on the timestamp.
 */
function newestFirst<T>(rows: T[], timestamp: (row: T) => string, limit: number): T[] {
  return [...rows]
    .reverse()
    .sort((a, b) => timestamp(b).localeCompare(timestamp(a)))
    .slice(0, Math.max(limit, 0));
}

export class MemoryPredictionStore implements IPredictionStore {
  private readonly features = new Map<PolicyNumber, OnlineFeatureRow>();
  private readonly predictions = new Map<string, PredictionRow>();

  async upsertFeatures(
    result: PredictionResult,
    at: Date = new Date()
  ): Promise<OnlineFeatureRow> {
    const now = at.toISOString();
    const existing = this.features.get(result.policyNumber);
    const row: OnlineFeatureRow = existing
      ? {
          ...toOnlineFeatureRow(result, existing.feature_created_at),
          feature_updated_at: now,
        }
      : toOnlineFeatureRow(result, now);
    this.features.set(result.policyNumber, row);
    return row;
  }

  async insertPrediction(
    result: PredictionResult,
    at: Date = new Date()
  ): Promise<PredictionRow> {
    const id = predictionId(result.policyNumber);
    if (this.predictions.has(id)) {
      throw new Error(`Prediction ${id} already exists`);
    }

    const now = at.toISOString();
    const row: PredictionRow = {
      prediction_id: id,
      policy_number: result.policyNumber,
      prediction: result.riskScore,
      prediction_class: result.riskLevel,
      model_name: MODEL_NAME,
      model_version: result.modelVersion,
      score_date: now,
      created_at: now,
    };
    this.predictions.set(id, row);
    return row;
  }

  async getRecentFeatures(limit = 10): Promise<OnlineFeatureRow[]> {
    return newestFirst(
      Array.from(this.features.values()),
      (r) => r.feature_created_at,
      limit
    );
  }

  async getRecentPredictions(limit = 10): Promise<PredictionRow[]> {
    return newestFirst(
      Array.from(this.predictions.values()),
      (r) => r.created_at,
      limit
    );
  }
}

export type SyncStatus = {
  featureStore: boolean;
  predictions: boolean;
};

/**
 * Writes a prediction to both tables. A failing table is logged and reported
 * as `false`; the other write still happens.
 */
export async function syncPrediction(
  store: IPredictionStore,
  result: PredictionResult,
  at: Date = new Date()
): Promise<SyncStatus> {
  const status: SyncStatus = { featureStore: false, predictions: false };

  try {
    await store.upsertFeatures(result, at);
    status.featureStore = true;
  } catch (err) {
    console.error(`Feature store write failed for ${result.policyNumber}:`, err);
  }

  try {
    await store.insertPrediction(result, at);
    status.predictions = true;
  } catch (err) {
    console.error(`Prediction write failed for ${result.policyNumber}:`, err);
  }

  return status;
}
