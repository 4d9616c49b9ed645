import type { RxFeatures } from "./types";

/**
 * Returns a fresh RX feature mapping with every field at its default.
 */
export function defaultRxFeatures(): RxFeatures {
  return {
    rx_total_fills: 0,
    rx_unique_drugs: 0,
    rx_unique_ndcs: 0,
    rx_unique_specialties: 0,
    rx_unique_prescribers: 0,

    rx_drug_statin: false,
    rx_drug_metformin: false,
    rx_drug_insulin: false,
    rx_drug_opioid: false,
    rx_drug_benzo: false,
    rx_drug_antidepressant: false,
    rx_drug_antipsychotic: false,
    rx_drug_blood_thinner: false,
    rx_drug_ace_inhibitor: false,
    rx_drug_beta_blocker: false,
    rx_drug_calcium_blocker: false,
    rx_drug_diuretic: false,
    rx_drug_ppi: false,
    rx_drug_thyroid: false,
    rx_drug_antibiotic: false,
    rx_drug_steroid: false,
    rx_drug_immunosuppressant: false,
    rx_drug_chemo: false,
    rx_drug_biologic: false,
    rx_drug_adhd: false,
    rx_drug_sleep: false,
    rx_drug_muscle_relaxant: false,
    rx_drug_gabapentin: false,
    rx_drug_suboxone: false,

    rx_specialty_cardiology: false,
    rx_specialty_endocrinology: false,
    rx_specialty_oncology: false,
    rx_specialty_psychiatry: false,
    rx_specialty_neurology: false,
    rx_specialty_pain_management: false,
    rx_specialty_rheumatology: false,
    rx_specialty_pulmonology: false,
    rx_specialty_gastroenterology: false,
    rx_specialty_nephrology: false,
    rx_specialty_primary_care: false,
    rx_specialty_emergency: false,

    flag_opioid_and_benzo: false,
    flag_polypharmacy_5: false,
    flag_polypharmacy_10: false,
    flag_high_risk_combo: false,
    flag_multiple_controlled: false,
    flag_multiple_prescribers: false,

    rx_risk_score: 0,
    rx_complexity_score: 0,
    rx_cardiac_risk_score: 0,
    rx_metabolic_risk_score: 0,
    rx_mental_health_risk_score: 0,
    rx_pain_risk_score: 0,
    rx_overall_score: 0,
  };
}

export const RX_FEATURE_NAMES: readonly string[] = Object.freeze(
  Object.keys(defaultRxFeatures())
);

/**
 * Formulary substrings searched for in the upper-cased, space-joined generic
 * drug names. Categories without an entry here are never set.
 */
export const RX_DRUG_KEYWORDS = {
  statin: ["STATIN", "ATORVASTATIN", "SIMVASTATIN"],
  metformin: ["METFORMIN"],
  insulin: ["INSULIN"],
  opioid: ["OXYCODONE", "HYDROCODONE", "MORPHINE", "FENTANYL"],
  benzo: ["ALPRAZOLAM", "DIAZEPAM", "LORAZEPAM", "CLONAZEPAM"],
  antidepressant: ["SERTRALINE", "FLUOXETINE", "ESCITALOPRAM"],
  antipsychotic: ["QUETIAPINE", "RISPERIDONE", "ARIPIPRAZOLE"],
  bloodThinner: ["WARFARIN", "ELIQUIS", "XARELTO"],
  gabapentin: ["GABAPENTIN", "PREGABALIN"],
  suboxone: ["SUBOXONE", "BUPRENORPHINE"],
} as const;

const DRUG_FILL_RE = /<DrugFill>/g;
const GENERIC_NAME_RE = /<DrugGenericName>([^<]+)<\/DrugGenericName>/g;
const SPECIALTY_RE = /<PhysicianSpecialty>([^<]+)<\/PhysicianSpecialty>/g;

function uniqueCaptures(text: string, re: RegExp): Set<string> {
  return new Set(Array.from(text.matchAll(re), (m) => m[1]));
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => haystack.includes(n));
}

/**
 * Extracts RX features from a prescription history document.
 *
 * Same tolerance as the MIB extractor: each pattern is matched on its own and
 * a pattern that finds nothing leaves its feature at the default.
 */
export function extractRxFeatures(xml?: string | null): RxFeatures {
  const features = defaultRxFeatures();
  if (!xml) return features;

  features.rx_total_fills = (xml.match(DRUG_FILL_RE) ?? []).length;

  const drugs = uniqueCaptures(xml, GENERIC_NAME_RE);
  const specialties = uniqueCaptures(xml, SPECIALTY_RE);
  features.rx_unique_drugs = drugs.size;
  features.rx_unique_specialties = specialties.size;

  const drugText = Array.from(drugs).join(" ").toUpperCase();
  const kw = RX_DRUG_KEYWORDS;
  features.rx_drug_statin = containsAny(drugText, kw.statin);
  features.rx_drug_metformin = containsAny(drugText, kw.metformin);
  features.rx_drug_insulin = containsAny(drugText, kw.insulin);
  features.rx_drug_opioid = containsAny(drugText, kw.opioid);
  features.rx_drug_benzo = containsAny(drugText, kw.benzo);
  features.rx_drug_antidepressant = containsAny(drugText, kw.antidepressant);
  features.rx_drug_antipsychotic = containsAny(drugText, kw.antipsychotic);
  features.rx_drug_blood_thinner = containsAny(drugText, kw.bloodThinner);
  features.rx_drug_gabapentin = containsAny(drugText, kw.gabapentin);
  features.rx_drug_suboxone = containsAny(drugText, kw.suboxone);

  features.flag_opioid_and_benzo =
    features.rx_drug_opioid && features.rx_drug_benzo;
  features.flag_polypharmacy_5 = features.rx_unique_drugs >= 5;
  features.flag_polypharmacy_10 = features.rx_unique_drugs >= 10;
  features.flag_high_risk_combo =
    features.flag_opioid_and_benzo ||
    (features.rx_drug_opioid && features.rx_drug_gabapentin);

  features.rx_pain_risk_score = Math.min(
    1.0,
    (features.rx_drug_opioid ? 0.15 : 0) +
      (features.rx_drug_benzo ? 0.1 : 0) +
      (features.flag_opioid_and_benzo ? 0.25 : 0)
  );
  features.rx_complexity_score = Math.min(1.0, features.rx_unique_drugs * 0.08);
  features.rx_risk_score =
    features.rx_pain_risk_score * 0.5 + features.rx_complexity_score * 0.5;

  return features;
}
