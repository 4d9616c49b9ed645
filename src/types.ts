/**
 * Policy identifier carried through every prediction.
 */
export type PolicyNumber = string;

/**
 * Features extracted from an MIB (Medical Information Bureau) response.
 *
 * Every field is always present; fields the extractor does not compute keep
 * their defaults.
 */
export type MibFeatures = {
  // Core metrics
  mib_hit_count: number;
  mib_try_count: number;
  mib_code_count: number;
  mib_total_records: number;
  mib_has_hit: boolean;

  // BMI
  mib_avg_bmi: number;
  mib_max_bmi: number;
  mib_min_bmi: number;
  mib_bmi_over_30: boolean;
  mib_bmi_over_35: boolean;

  // Build
  mib_avg_height: number;
  mib_avg_weight: number;
  mib_max_weight: number;
  mib_weight_over_200: boolean;

  // Condition codes
  mib_has_cardiac_code: boolean;
  mib_has_diabetes_code: boolean;
  mib_has_cancer_code: boolean;
  mib_has_respiratory_code: boolean;
  mib_has_mental_health_code: boolean;
  mib_has_substance_abuse_code: boolean;
  mib_has_liver_code: boolean;
  mib_has_kidney_code: boolean;
  mib_has_neurological_code: boolean;
  mib_has_autoimmune_code: boolean;
  mib_has_blood_disorder_code: boolean;
  mib_has_gastrointestinal_code: boolean;
  mib_has_musculoskeletal_code: boolean;
  mib_has_endocrine_code: boolean;
  mib_has_infectious_code: boolean;

  // Risk indicators
  mib_high_risk_code_count: number;
  mib_medium_risk_code_count: number;
  mib_low_risk_code_count: number;
  mib_hit_ratio: number;
  mib_multiple_hits: boolean;

  // Derived scores
  mib_risk_score: number;
  mib_severity_score: number;
  mib_complexity_score: number;
  mib_overall_score: number;
};

/**
 * Features extracted from an RX (prescription fill history) response.
 */
export type RxFeatures = {
  // Core metrics
  rx_total_fills: number;
  rx_unique_drugs: number;
  rx_unique_ndcs: number;
  rx_unique_specialties: number;
  rx_unique_prescribers: number;

  // Drug categories
  rx_drug_statin: boolean;
  rx_drug_metformin: boolean;
  rx_drug_insulin: boolean;
  rx_drug_opioid: boolean;
  rx_drug_benzo: boolean;
  rx_drug_antidepressant: boolean;
  rx_drug_antipsychotic: boolean;
  rx_drug_blood_thinner: boolean;
  rx_drug_ace_inhibitor: boolean;
  rx_drug_beta_blocker: boolean;
  rx_drug_calcium_blocker: boolean;
  rx_drug_diuretic: boolean;
  rx_drug_ppi: boolean;
  rx_drug_thyroid: boolean;
  rx_drug_antibiotic: boolean;
  rx_drug_steroid: boolean;
  rx_drug_immunosuppressant: boolean;
  rx_drug_chemo: boolean;
  rx_drug_biologic: boolean;
  rx_drug_adhd: boolean;
  rx_drug_sleep: boolean;
  rx_drug_muscle_relaxant: boolean;
  rx_drug_gabapentin: boolean;
  rx_drug_suboxone: boolean;

  // Prescriber specialties
  rx_specialty_cardiology: boolean;
  rx_specialty_endocrinology: boolean;
  rx_specialty_oncology: boolean;
  rx_specialty_psychiatry: boolean;
  rx_specialty_neurology: boolean;
  rx_specialty_pain_management: boolean;
  rx_specialty_rheumatology: boolean;
  rx_specialty_pulmonology: boolean;
  rx_specialty_gastroenterology: boolean;
  rx_specialty_nephrology: boolean;
  rx_specialty_primary_care: boolean;
  rx_specialty_emergency: boolean;

  // Risk flags
  flag_opioid_and_benzo: boolean;
  flag_polypharmacy_5: boolean;
  flag_polypharmacy_10: boolean;
  flag_high_risk_combo: boolean;
  flag_multiple_controlled: boolean;
  flag_multiple_prescribers: boolean;

  // Derived scores
  rx_risk_score: number;
  rx_complexity_score: number;
  rx_cardiac_risk_score: number;
  rx_metabolic_risk_score: number;
  rx_mental_health_risk_score: number;
  rx_pain_risk_score: number;
  rx_overall_score: number;
};

/**
 * Flat union of both vocabularies. Key prefixes (`mib_`, `rx_`, `flag_`)
 * keep the two sets disjoint.
 */
export type CombinedFeatures = MibFeatures & RxFeatures;

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

/**
 * Strategy requested by configuration or by the caller.
 */
export type ScoringStrategy = "rule-based" | "remote";

/**
 * Strategy that actually produced a score. A remote request that falls back
 * is reported as `"rule-based"`.
 */
export type ModelVersion = "rule-based" | "remote-model";

/**
 * Outcome of a remote model call. Failures carry a reason instead of
 * throwing so the fallback decision stays explicit.
 */
export type RemoteScoreResult =
  | { ok: true; score: number }
  | { ok: false; reason: string };

export type ScoredRisk = {
  score: number;
  modelVersion: ModelVersion;
};

/**
 * One subject's evidence, as received by the pipeline.
 */
export type PredictRequest = {
  policyNumber: PolicyNumber;
  mibXml?: string | null;
  rxXml?: string | null;
};

/**
 * Pipeline output for a single policy. Frozen after construction.
 */
export type PredictionResult = Readonly<{
  policyNumber: PolicyNumber;
  riskScore: number;
  riskLevel: RiskLevel;
  modelVersion: ModelVersion;
  inferenceMs: number;
  featureCount: number;
  features: Readonly<{ mib: MibFeatures; rx: RxFeatures }>;
  combined: CombinedFeatures;
}>;

/**
 * Wire shape of one prediction, as returned by `/predict`.
 */
export type PredictionResponse = {
  policy_number: PolicyNumber;
  risk_score: number;
  risk_level: RiskLevel;
  model_version: ModelVersion;
  inference_ms: number;
  feature_count: number;
  features: {
    mib: MibFeatures;
    rx: RxFeatures;
  };
};

/**
 * Row of the online feature table, keyed by policy number.
 */
export type OnlineFeatureRow = {
  policy_number: PolicyNumber;
  has_mib_data: boolean;
  has_rx_data: boolean;
  mib_hit_count: number;
  mib_code_count: number;
  mib_avg_bmi: number;
  mib_max_bmi: number;
  mib_risk_score: number;
  rx_total_fills: number;
  rx_unique_drugs: number;
  rx_unique_specialties: number;
  rx_drug_opioid: boolean;
  rx_drug_benzodiazepine: boolean;
  rx_drug_statin: boolean;
  rx_drug_insulin: boolean;
  rx_drug_metformin: boolean;
  rx_risk_score: number;
  flag_opioid_and_benzo: boolean;
  flag_polypharmacy_5: boolean;
  flag_polypharmacy_10: boolean;
  flag_high_risk: boolean;
  combined_risk_score: number;
  feature_created_at: string;
  feature_updated_at: string | null;
};

/**
 * Row of the predictions table.
 */
export type PredictionRow = {
  prediction_id: string;
  policy_number: PolicyNumber;
  prediction: number;
  prediction_class: RiskLevel;
  model_name: string;
  model_version: ModelVersion;
  score_date: string;
  created_at: string;
};
