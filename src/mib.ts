import type { MibFeatures } from "./types";

/**
 * Returns a fresh MIB feature mapping with every field at its default.
 */
export function defaultMibFeatures(): MibFeatures {
  return {
    mib_hit_count: 0,
    mib_try_count: 0,
    mib_code_count: 0,
    mib_total_records: 0,
    mib_has_hit: false,

    mib_avg_bmi: 0,
    mib_max_bmi: 0,
    mib_min_bmi: 0,
    mib_bmi_over_30: false,
    mib_bmi_over_35: false,

    mib_avg_height: 0,
    mib_avg_weight: 0,
    mib_max_weight: 0,
    mib_weight_over_200: false,

    mib_has_cardiac_code: false,
    mib_has_diabetes_code: false,
    mib_has_cancer_code: false,
    mib_has_respiratory_code: false,
    mib_has_mental_health_code: false,
    mib_has_substance_abuse_code: false,
    mib_has_liver_code: false,
    mib_has_kidney_code: false,
    mib_has_neurological_code: false,
    mib_has_autoimmune_code: false,
    mib_has_blood_disorder_code: false,
    mib_has_gastrointestinal_code: false,
    mib_has_musculoskeletal_code: false,
    mib_has_endocrine_code: false,
    mib_has_infectious_code: false,

    mib_high_risk_code_count: 0,
    mib_medium_risk_code_count: 0,
    mib_low_risk_code_count: 0,
    mib_hit_ratio: 0,
    mib_multiple_hits: false,

    mib_risk_score: 0,
    mib_severity_score: 0,
    mib_complexity_score: 0,
    mib_overall_score: 0,
  };
}

export const MIB_FEATURE_NAMES: readonly string[] = Object.freeze(
  Object.keys(defaultMibFeatures())
);

/**
 * Substrings searched for in the upper-cased, space-joined response codes.
 */
export const MIB_CONDITION_KEYWORDS = {
  cardiac: ["CARDIAC", "HEART", "CVD"],
  diabetes: ["DIABETES", "DM", "INSULIN"],
  cancer: ["CANCER", "TUMOR", "MALIG"],
  respiratory: ["COPD", "ASTHMA", "PULM"],
  mentalHealth: ["MENTAL", "PSYCH", "DEPRESS"],
  substanceAbuse: ["SUBSTANCE", "ALCOHOL", "DRUG"],
} as const;

// Case-sensitive, matched against the raw document.
const HIT_MARKERS = ["HIT", "RelationRoleCode>HIT<"];

const RESPONSE_DATA_RE = /<ResponseData>([^<]+)<\/ResponseData>/g;
const BMI_RE = /<BMI>(\d+\.?\d*)<\/BMI>/g;

function captureAll(text: string, re: RegExp): string[] {
  return Array.from(text.matchAll(re), (m) => m[1]);
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => haystack.includes(n));
}

/**
 * Extracts MIB features from a response document.
 *
 * Matching is pattern-based rather than a full XML parse, so partial or
 * malformed documents still yield whatever patterns they contain. Missing or
 * empty input returns the defaults.
 */
export function extractMibFeatures(xml?: string | null): MibFeatures {
  const features = defaultMibFeatures();
  if (!xml) return features;

  const codes = captureAll(xml, RESPONSE_DATA_RE);
  features.mib_code_count = codes.length;
  features.mib_total_records = codes.length;

  if (HIT_MARKERS.some((marker) => xml.includes(marker))) {
    features.mib_hit_count = 1;
    features.mib_has_hit = true;
  }

  const bmis = captureAll(xml, BMI_RE)
    .map((b) => Number.parseFloat(b))
    .filter((b) => Number.isFinite(b));
  if (bmis.length > 0) {
    let sum = 0;
    let max = bmis[0];
    let min = bmis[0];
    for (const b of bmis) {
      sum += b;
      if (b > max) max = b;
      if (b < min) min = b;
    }
    features.mib_avg_bmi = sum / bmis.length;
    features.mib_max_bmi = max;
    features.mib_min_bmi = min;
    features.mib_bmi_over_30 = features.mib_max_bmi > 30;
    features.mib_bmi_over_35 = features.mib_max_bmi > 35;
  }

  const codeText = codes.join(" ").toUpperCase();
  const kw = MIB_CONDITION_KEYWORDS;
  features.mib_has_cardiac_code = containsAny(codeText, kw.cardiac);
  features.mib_has_diabetes_code = containsAny(codeText, kw.diabetes);
  features.mib_has_cancer_code = containsAny(codeText, kw.cancer);
  features.mib_has_respiratory_code = containsAny(codeText, kw.respiratory);
  features.mib_has_mental_health_code = containsAny(codeText, kw.mentalHealth);
  features.mib_has_substance_abuse_code = containsAny(
    codeText,
    kw.substanceAbuse
  );

  const highRisk =
    Number(features.mib_has_cancer_code) +
    Number(features.mib_has_cardiac_code) +
    Number(features.mib_has_substance_abuse_code);
  features.mib_high_risk_code_count = highRisk;
  features.mib_risk_score = Math.min(
    1.0,
    highRisk * 0.3 + features.mib_hit_count * 0.2
  );

  return features;
}
