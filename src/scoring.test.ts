import { readFileSync } from "node:fs";
import { afterEach, describe, expect, test, vi } from "vitest";
import { defaultMibFeatures, MIB_FEATURE_NAMES } from "./mib";
import type { RemoteScorer } from "./model-service";
import { defaultRxFeatures, RX_FEATURE_NAMES } from "./rx";
import {
  classifyRisk,
  combineFeatures,
  computeRiskScore,
  createScoringContext,
  FEATURE_COUNT,
  predictRisk,
  ruleBasedRiskScore,
  type ScoringContext,
} from "./scoring";
import type { CombinedFeatures, RemoteScoreResult } from "./types";

const RULE_BASED: ScoringContext = { strategy: "rule-based" };

function defaults(): CombinedFeatures {
  return combineFeatures(defaultMibFeatures(), defaultRxFeatures());
}

type FlagKey = {
  [K in keyof CombinedFeatures]: CombinedFeatures[K] extends boolean ? K : never;
}[keyof CombinedFeatures];

type CountKey =
  | "mib_hit_count"
  | "mib_code_count"
  | "rx_total_fills"
  | "rx_unique_drugs";

function withFlag(base: CombinedFeatures, key: FlagKey): CombinedFeatures {
  const f = { ...base };
  f[key] = true;
  return f;
}

function withCount(
  base: CombinedFeatures,
  key: CountKey,
  increment: number
): CombinedFeatures {
  const f = { ...base };
  f[key] += increment;
  return f;
}

const FLAG_WEIGHTS: [FlagKey, number][] = [
  ["mib_bmi_over_35", 0.1],
  ["mib_has_cardiac_code", 0.1],
  ["mib_has_cancer_code", 0.15],
  ["mib_has_substance_abuse_code", 0.12],
  ["rx_drug_opioid", 0.15],
  ["rx_drug_benzo", 0.1],
  ["rx_drug_insulin", 0.12],
  ["flag_opioid_and_benzo", 0.25],
  ["flag_high_risk_combo", 0.15],
  ["flag_polypharmacy_10", 0.1],
];

function remoteContext(result: RemoteScoreResult): ScoringContext {
  const modelService: RemoteScorer = { predict: async () => result };
  return { strategy: "remote", modelService };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("combineFeatures", () => {
  test("is the disjoint union of both vocabularies", () => {
    const combined = defaults();
    expect(Object.keys(combined)).toHaveLength(
      MIB_FEATURE_NAMES.length + RX_FEATURE_NAMES.length
    );
  });

  test("declared feature count is a constant", () => {
    expect(FEATURE_COUNT).toBe(105);
  });
});

describe("ruleBasedRiskScore", () => {
  test("defaults score zero", () => {
    expect(ruleBasedRiskScore(defaults())).toBe(0);
  });

  test("missing keys read as defaults", () => {
    expect(ruleBasedRiskScore({})).toBe(0);
    expect(ruleBasedRiskScore({ rx_drug_opioid: true })).toBeCloseTo(0.15, 10);
  });

  test("caps count contributions", () => {
    expect(ruleBasedRiskScore({ mib_code_count: 4 })).toBeCloseTo(0.1, 10);
    expect(ruleBasedRiskScore({ mib_code_count: 100 })).toBeCloseTo(0.15, 10);
    expect(ruleBasedRiskScore({ rx_total_fills: 5 })).toBeCloseTo(0.1, 10);
    expect(ruleBasedRiskScore({ rx_total_fills: 100 })).toBeCloseTo(0.15, 10);
    expect(ruleBasedRiskScore({ rx_unique_drugs: 3 })).toBeCloseTo(0.06, 10);
    expect(ruleBasedRiskScore({ rx_unique_drugs: 100 })).toBeCloseTo(0.12, 10);
  });

  test("weights each flag", () => {
    for (const [key, weight] of FLAG_WEIGHTS) {
      expect(ruleBasedRiskScore(withFlag(defaults(), key))).toBeCloseTo(
        weight,
        10
      );
    }
  });

  test("every positive indicator at once is capped at 1.0", () => {
    const f = defaults();
    f.mib_hit_count = 1;
    f.mib_code_count = 10;
    f.mib_bmi_over_35 = true;
    f.mib_has_cardiac_code = true;
    f.mib_has_cancer_code = true;
    f.mib_has_substance_abuse_code = true;
    f.rx_total_fills = 20;
    f.rx_unique_drugs = 12;
    f.rx_drug_opioid = true;
    f.rx_drug_benzo = true;
    f.rx_drug_insulin = true;
    f.flag_opioid_and_benzo = true;
    f.flag_high_risk_combo = true;
    f.flag_polypharmacy_10 = true;
    expect(ruleBasedRiskScore(f)).toBe(1);
  });

  test("never decreases when a flag turns on or a count grows", () => {
    const base = withCount(withFlag(defaults(), "rx_drug_benzo"), "mib_code_count", 2);
    const before = ruleBasedRiskScore(base);

    const flags: FlagKey[] = [
      ...FLAG_WEIGHTS.map(([key]) => key),
      "mib_has_diabetes_code",
      "mib_has_hit",
      "rx_drug_statin",
      "flag_polypharmacy_5",
    ];
    for (const key of flags) {
      expect(ruleBasedRiskScore(withFlag(base, key))).toBeGreaterThanOrEqual(
        before
      );
    }

    const counts: CountKey[] = [
      "mib_hit_count",
      "mib_code_count",
      "rx_total_fills",
      "rx_unique_drugs",
    ];
    for (const key of counts) {
      for (const n of [1, 3, 10, 50]) {
        expect(ruleBasedRiskScore(withCount(base, key, n))).toBeGreaterThanOrEqual(
          before
        );
      }
    }
  });

  test("stays within [0, 1]", () => {
    for (const hits of [0, 1, 5, 20]) {
      const score = ruleBasedRiskScore({
        mib_hit_count: hits,
        rx_total_fills: hits * 3,
        flag_opioid_and_benzo: hits > 1,
      });
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe("classifyRisk", () => {
  test("thresholds are inclusive", () => {
    expect(classifyRisk(0.6)).toBe("HIGH");
    expect(classifyRisk(0.3)).toBe("MEDIUM");
    expect(classifyRisk(0.2999)).toBe("LOW");
    expect(classifyRisk(0.5999)).toBe("MEDIUM");
  });

  test("bounds", () => {
    expect(classifyRisk(0)).toBe("LOW");
    expect(classifyRisk(1)).toBe("HIGH");
  });
});

describe("computeRiskScore", () => {
  test("rule-based context", async () => {
    await expect(
      computeRiskScore({ rx_drug_insulin: true }, RULE_BASED)
    ).resolves.toEqual({ score: 0.12, modelVersion: "rule-based" });
  });

  test("uses the remote score when the call succeeds", async () => {
    await expect(
      computeRiskScore({ rx_drug_insulin: true }, remoteContext({ ok: true, score: 0.42 }))
    ).resolves.toEqual({ score: 0.42, modelVersion: "remote-model" });
  });

  test("falls back to the rule-based score when the call fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const features = { rx_drug_insulin: true, mib_hit_count: 1 };

    const scored = await computeRiskScore(
      features,
      remoteContext({ ok: false, reason: "HTTP 503 Service Unavailable" })
    );

    expect(scored.modelVersion).toBe("rule-based");
    expect(scored.score).toBe(ruleBasedRiskScore(features));
    expect(warn).toHaveBeenCalledWith(
      "Model service error: HTTP 503 Service Unavailable, using rule-based fallback"
    );
  });

  test("falls back when the endpoint is unreachable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const ctx = createScoringContext(
      {
        nodeEnv: "test",
        port: 3000,
        strategy: "remote",
        modelServiceUrl: "http://model.test/predict",
        modelServiceTimeoutMs: 50,
      },
      async () => {
        throw new TypeError("fetch failed");
      }
    );

    const scored = await computeRiskScore({ rx_drug_opioid: true }, ctx);
    expect(scored).toEqual({ score: 0.15, modelVersion: "rule-based" });
  });
});

describe("createScoringContext", () => {
  test("rule-based config needs no client", () => {
    expect(
      createScoringContext({
        nodeEnv: "test",
        port: 3000,
        strategy: "rule-based",
        modelServiceUrl: "http://model.test/predict",
        modelServiceTimeoutMs: 5000,
      })
    ).toEqual({ strategy: "rule-based" });
  });
});

describe("predictRisk", () => {
  test("both documents absent", async () => {
    const r = await predictRisk({ policyNumber: "TEST-001" }, RULE_BASED);
    expect(r.features.mib).toEqual(defaultMibFeatures());
    expect(r.features.rx).toEqual(defaultRxFeatures());
    expect(r.riskScore).toBe(0);
    expect(r.riskLevel).toBe("LOW");
    expect(r.modelVersion).toBe("rule-based");
    expect(r.featureCount).toBe(105);
    expect(r.inferenceMs).toBeGreaterThanOrEqual(0);
  });

  test("high BMI and a cardiac code", async () => {
    const r = await predictRisk(
      {
        policyNumber: "TEST-002",
        mibXml:
          "<Response><ResponseData>CARDIAC</ResponseData><BMI>40</BMI></Response>",
      },
      RULE_BASED
    );
    expect(r.combined.mib_bmi_over_35).toBe(true);
    expect(r.combined.mib_has_cardiac_code).toBe(true);
    expect(r.combined.mib_avg_bmi).toBe(40);
    // 0.025 (one code) + 0.10 (BMI) + 0.10 (cardiac)
    expect(r.riskScore).toBeCloseTo(0.225, 10);
    expect(r.riskLevel).toBe("LOW");
  });

  test("opioid and benzodiazepine", async () => {
    const r = await predictRisk(
      {
        policyNumber: "TEST-003",
        rxXml:
          "<IntelRXResponse><DrugFill><DrugGenericName>OXYCODONE</DrugGenericName></DrugFill><DrugFill><DrugGenericName>ALPRAZOLAM</DrugGenericName></DrugFill></IntelRXResponse>",
      },
      RULE_BASED
    );
    expect(r.combined.flag_opioid_and_benzo).toBe(true);
    // fills 0.04 + drugs 0.04 + opioid 0.15 + benzo 0.10 + pair 0.25 + combo 0.15
    expect(r.riskScore).toBeCloseTo(0.73, 10);
    expect(r.riskLevel).toBe("HIGH");
  });

  test("identical input gives identical features and score", async () => {
    const request = {
      policyNumber: "TEST-004",
      mibXml: "<RelationRoleCode>HIT</RelationRoleCode><ResponseData>ASTHMA</ResponseData>",
      rxXml: "<DrugFill><DrugGenericName>INSULIN</DrugGenericName></DrugFill>",
    };
    const a = await predictRisk(request, RULE_BASED);
    const b = await predictRisk(request, RULE_BASED);
    expect(a.combined).toEqual(b.combined);
    expect(a.riskScore).toBe(b.riskScore);
    expect(a.riskLevel).toBe(b.riskLevel);
  });

  test("reports the fallback strategy when the remote call fails", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const r = await predictRisk(
      {
        policyNumber: "TEST-005",
        rxXml: "<DrugFill><DrugGenericName>FENTANYL</DrugGenericName></DrugFill>",
      },
      remoteContext({ ok: false, reason: "malformed response body" })
    );
    expect(r.modelVersion).toBe("rule-based");
    expect(r.riskScore).toBe(ruleBasedRiskScore(r.combined));
  });

  test("results are frozen", async () => {
    const r = await predictRisk({ policyNumber: "TEST-006" }, RULE_BASED);
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.features)).toBe(true);
    expect(Object.isFrozen(r.features.mib)).toBe(true);
    expect(Object.isFrozen(r.features.rx)).toBe(true);
    expect(Object.isFrozen(r.combined)).toBe(true);
  });
});

describe("sample documents", () => {
  test("score as MEDIUM", async () => {
    const read = (name: string) =>
      readFileSync(new URL(`../samples/${name}`, import.meta.url), "utf8");

    const r = await predictRisk(
      { policyNumber: "SAMPLE-001", mibXml: read("mib.xml"), rxXml: read("rx.xml") },
      RULE_BASED
    );

    expect(r.combined.mib_has_hit).toBe(true);
    expect(r.combined.mib_code_count).toBe(2);
    expect(r.combined.mib_has_cardiac_code).toBe(true);
    expect(r.combined.mib_has_respiratory_code).toBe(true);
    expect(r.combined.rx_total_fills).toBe(3);
    expect(r.combined.rx_unique_drugs).toBe(2);
    expect(r.combined.rx_unique_specialties).toBe(2);
    // hit 0.15 + codes 0.05 + BMI 0.10 + cardiac 0.10 + fills 0.06 + drugs 0.04
    expect(r.riskScore).toBeCloseTo(0.5, 10);
    expect(r.riskLevel).toBe("MEDIUM");
  });
});
