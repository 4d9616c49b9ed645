import { useState } from "react";

type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

type Prediction = {
  policy_number: string;
  risk_score: number;
  risk_level: RiskLevel;
  model_version: string;
  inference_ms: number;
  feature_count: number;
  features: {
    mib: Record<string, number | boolean>;
    rx: Record<string, number | boolean>;
  };
  mlops?: { featureStore: boolean; predictions: boolean };
};

type FeatureRow = {
  policy_number: string;
  combined_risk_score: number;
  has_mib_data: boolean;
  has_rx_data: boolean;
  feature_created_at: string;
};

type PredictionRow = {
  prediction_id: string;
  policy_number: string;
  prediction: number;
  prediction_class: RiskLevel;
  model_version: string;
  created_at: string;
};

const SAMPLE_MIB_XML =
  '<?xml version="1.0"?><Response><ResponseData>CODE1</ResponseData></Response>';
const SAMPLE_RX_XML =
  '<?xml version="1.0"?><IntelRXResponse><DrugFill><DrugGenericName>METFORMIN</DrugGenericName></DrugFill></IntelRXResponse>';

const LEVEL_COLORS: Record<RiskLevel, string> = {
  HIGH: "crimson",
  MEDIUM: "darkorange",
  LOW: "seagreen",
};

function errorFrom(body: unknown, status: number): string {
  if (body && typeof body === "object" && "error" in body) {
    return String(body.error);
  }
  return `HTTP ${status}`;
}

async function getJson<T>(url: string, init?: RequestInit): Promise<T> {
  const res = await fetch(url, init);
  const body: unknown = await res.json();
  if (!res.ok) throw new Error(errorFrom(body, res.status));
  return body as T;
}

function policyNumberFor(prefix: string): string {
  const stamp = new Date().toISOString().replace(/[-:T.Z]/g, "").slice(0, 17);
  return `${prefix}-${stamp}`;
}

function when(iso: string): string {
  return iso.slice(11, 19);
}

export default function Home() {
  const [prefix, setPrefix] = useState("TEST");
  const [persist, setPersist] = useState(false);
  const [mibXml, setMibXml] = useState(SAMPLE_MIB_XML);
  const [rxXml, setRxXml] = useState(SAMPLE_RX_XML);

  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [prediction, setPrediction] = useState<Prediction | null>(null);
  const [roundTripMs, setRoundTripMs] = useState<number | null>(null);
  const [featureRows, setFeatureRows] = useState<FeatureRow[] | null>(null);
  const [predictionRows, setPredictionRows] = useState<PredictionRow[] | null>(
    null
  );

  async function runInference(): Promise<void> {
    setLoading(true);
    setError(null);
    setPrediction(null);

    try {
      const started = performance.now();
      const body = await getJson<Prediction>("/predict", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          policy_number: policyNumberFor(prefix),
          mib_xml: mibXml,
          rx_xml: rxXml,
          persist,
        }),
      });
      setRoundTripMs(Math.round((performance.now() - started) * 100) / 100);
      setPrediction(body);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Inference failed");
    } finally {
      setLoading(false);
    }
  }

  async function loadTables(): Promise<void> {
    setLoading(true);
    setError(null);

    try {
      const [features, predictions] = await Promise.all([
        getJson<{ data: FeatureRow[] }>("/mlops/features?limit=10"),
        getJson<{ data: PredictionRow[] }>("/mlops/predictions?limit=10"),
      ]);
      setFeatureRows(features.data);
      setPredictionRows(predictions.data);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to load tables");
    } finally {
      setLoading(false);
    }
  }

  return (
    <main>
      <h1>Evidence Risk Scoring</h1>
      <p>Score MIB and RX evidence documents and inspect persisted results.</p>

      <section>
        <h2>Test inference</h2>

        <div>
          <label>
            Policy prefix
            <br />
            <select value={prefix} onChange={(e) => setPrefix(e.target.value)}>
              <option>TEST</option>
              <option>DEMO</option>
              <option>PROD</option>
            </select>
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <label>
            <input
              type="checkbox"
              checked={persist}
              onChange={(e) => setPersist(e.target.checked)}
            />{" "}
            Save to feature store and predictions
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <label>
            MIB XML
            <br />
            <textarea
              value={mibXml}
              onChange={(e) => setMibXml(e.target.value)}
              rows={4}
              style={{ width: "min(640px, 100%)" }}
            />
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <label>
            RX XML
            <br />
            <textarea
              value={rxXml}
              onChange={(e) => setRxXml(e.target.value)}
              rows={4}
              style={{ width: "min(640px, 100%)" }}
            />
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <button onClick={() => void runInference()} disabled={loading}>
            {loading ? "Loading…" : "Run inference"}
          </button>{" "}
          <button onClick={() => void loadTables()} disabled={loading}>
            {loading ? "Loading…" : "Load stored results"}
          </button>
        </div>
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Results</h2>

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        {prediction ? (
          <>
            <ul>
              <li>
                Risk score: <strong>{prediction.risk_score.toFixed(3)}</strong>
              </li>
              <li>
                Risk level:{" "}
                <strong style={{ color: LEVEL_COLORS[prediction.risk_level] }}>
                  {prediction.risk_level}
                </strong>
              </li>
              <li>
                Inference: <strong>{prediction.inference_ms}ms</strong> (round
                trip {roundTripMs}ms)
              </li>
              <li>
                Policy <code>{prediction.policy_number}</code>, model{" "}
                <code>{prediction.model_version}</code>,{" "}
                {prediction.feature_count} features
              </li>
              {prediction.mlops ? (
                <li>
                  Feature store:{" "}
                  {prediction.mlops.featureStore ? "saved" : "failed"},
                  predictions:{" "}
                  {prediction.mlops.predictions ? "saved" : "failed"}
                </li>
              ) : null}
            </ul>

            <details>
              <summary>Full response</summary>
              <pre>{JSON.stringify(prediction, null, 2)}</pre>
            </details>
          </>
        ) : (
          <p>No inference run yet.</p>
        )}
      </section>

      {featureRows ? (
        <section style={{ marginTop: 24 }}>
          <h2>Online feature store</h2>
          {featureRows.length === 0 ? (
            <p>No features stored yet. Run inference with saving enabled.</p>
          ) : (
            <table cellPadding={6} style={{ borderCollapse: "collapse" }}>
              <thead>
                <tr>
                  <th align="left">Policy</th>
                  <th align="right">Risk Score</th>
                  <th align="left">MIB</th>
                  <th align="left">RX</th>
                  <th align="left">Created</th>
                </tr>
              </thead>
              <tbody>
                {featureRows.map((r) => (
                  <tr key={r.policy_number}>
                    <td>
                      <code>{r.policy_number}</code>
                    </td>
                    <td align="right">{r.combined_risk_score.toFixed(3)}</td>
                    <td>{r.has_mib_data ? "Yes" : "No"}</td>
                    <td>{r.has_rx_data ? "Yes" : "No"}</td>
                    <td>{when(r.feature_created_at)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          )}
        </section>
      ) : null}

      {predictionRows ? (
        <section style={{ marginTop: 24 }}>
          <h2>Model predictions</h2>
          {predictionRows.length === 0 ? (
            <p>No predictions stored yet. Run inference with saving enabled.</p>
          ) : (
            <table cellPadding={6} style={{ borderCollapse: "collapse" }}>
              <thead>
                <tr>
                  <th align="left">Policy</th>
                  <th align="right">Score</th>
                  <th align="left">Level</th>
                  <th align="left">Model</th>
                  <th align="left">Created</th>
                </tr>
              </thead>
              <tbody>
                {predictionRows.map((r) => (
                  <tr key={r.prediction_id}>
                    <td>
                      <code>{r.policy_number}</code>
                    </td>
                    <td align="right">{r.prediction.toFixed(3)}</td>
                    <td>{r.prediction_class}</td>
                    <td>{r.model_version}</td>
                    <td>{when(r.created_at)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          )}
        </section>
      ) : null}
    </main>
  );
}
