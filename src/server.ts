import express from "express";
import next from "next";
import { ConfigError, loadConfig } from "./config";
import {
  healthResponse,
  parsePredictBody,
  pingResponse,
  predictBatch,
  toPredictionResponse,
} from "./predict";
import { createScoringContext, FEATURE_COUNT, predictRisk } from "./scoring";
import { MemoryPredictionStore, syncPrediction } from "./store";

const SERVICE_NAME = "Evidence Risk Scoring API";
const SERVICE_VERSION = "1.0.0";

function parseLimit(value: unknown): number {
  const n = Number.parseInt(String(value ?? "10"), 10);
  return Number.isFinite(n) ? Math.min(Math.max(n, 1), 100) : 10;
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const dev = config.nodeEnv !== "production";
  const app = next({ dev });
  const handle = app.getRequestHandler();

  await app.prepare();

  const ctx = createScoringContext(config);
  const store = new MemoryPredictionStore();

  const server = express();
  server.use(express.json({ limit: "10mb" }));

  // POST /predict -> batch envelope, single request, or ping
  server.post("/predict", async (req, res) => {
    const body = parsePredictBody(req.body);

    try {
      switch (body.kind) {
        case "invalid":
          return res
            .status(400)
            .json({ error: "Invalid request body", issues: body.issues });
        case "ping":
          return res.json(pingResponse());
        case "batch":
          return res.json(await predictBatch(body.rows, ctx));
        case "single": {
          const { request } = body;
          const result = await predictRisk(
            {
              policyNumber: request.policy_number,
              mibXml: request.mib_xml,
              rxXml: request.rx_xml,
            },
            ctx
          );
          const response = toPredictionResponse(result);
          if (!request.persist) return res.json(response);

          const mlops = await syncPrediction(store, result);
          return res.json({ ...response, mlops });
        }
      }
    } catch (err) {
      console.error("Prediction failed:", err);
      return res
        .status(500)
        .json({ error: errorMessage(err, "Failed to compute prediction") });
    }
  });

  // POST /health -> liveness in the row-indexed envelope
  server.post("/health", (_req, res) => {
    res.json(healthResponse());
  });

  server.get("/info", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      features: FEATURE_COUNT,
      strategy: config.strategy,
      status: "running",
    });
  });

  // GET /mlops/features, /mlops/predictions -> latest persisted rows
  server.get("/mlops/features", async (req, res) => {
    try {
      const rows = await store.getRecentFeatures(parseLimit(req.query.limit));
      return res.json({ data: rows });
    } catch (err) {
      return res
        .status(500)
        .json({ error: errorMessage(err, "Failed to load features") });
    }
  });

  server.get("/mlops/predictions", async (req, res) => {
    try {
      const rows = await store.getRecentPredictions(parseLimit(req.query.limit));
      return res.json({ data: rows });
    } catch (err) {
      return res
        .status(500)
        .json({ error: errorMessage(err, "Failed to load predictions") });
    }
  });

  // Let Next handle everything else
  server.all("*", (req, res) =>
    handle(req, res).catch((err) => {
      console.error("Page render failed:", err);
      if (!res.headersSent) res.status(500).end();
    })
  );

  server.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (dev=${dev}, strategy=${config.strategy})`
    );
  });
}

main().catch((err) => {
  if (err instanceof ConfigError) console.error(err.message);
  else console.error("Fatal server error:", err);
  process.exit(1);
});
