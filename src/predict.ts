import { z } from "zod";
import { predictRisk, type ScoringContext } from "./scoring";
import type { PredictionResponse, PredictionResult } from "./types";

/**
 * `[rowIndex, policyNumber?, mibXml?, rxXml?]`, as sent by a SQL service
 * function. Trailing columns may be missing or null.
 */
const rowSchema = z.tuple([z.number().int()]).rest(z.string().nullable());

export const batchRequestSchema = z.object({
  data: z.array(rowSchema),
});

export const singleRequestSchema = z.object({
  policy_number: z.string().trim().min(1),
  mib_xml: z.string().nullish(),
  rx_xml: z.string().nullish(),
  persist: z.boolean().optional(),
});

export type BatchRow = z.infer<typeof rowSchema>;
export type SingleRequest = z.infer<typeof singleRequestSchema>;

export type PredictBody =
  | { kind: "batch"; rows: BatchRow[] }
  | { kind: "single"; request: SingleRequest }
  | { kind: "ping" }
  | { kind: "invalid"; issues: { path: string; message: string }[] };

export type BatchResponse<T> = { data: [number, T][] };

export type PingResponse = BatchResponse<{ status: string; message: string }>;

/**
 * Classifies and validates a `/predict` body.
 *
 * - `{ data: [...] }` is a batch of row-indexed tuples
 * - `{ policy_number, ... }` is a single request
 * - anything else is treated as a ping
 */
export function parsePredictBody(body: unknown): PredictBody {
  if (body && typeof body === "object") {
    if ("data" in body) {
      const parsed = batchRequestSchema.safeParse(body);
      return parsed.success
        ? { kind: "batch", rows: parsed.data.data }
        : { kind: "invalid", issues: formatIssues(parsed.error) };
    }
    if ("policy_number" in body) {
      const parsed = singleRequestSchema.safeParse(body);
      return parsed.success
        ? { kind: "single", request: parsed.data }
        : { kind: "invalid", issues: formatIssues(parsed.error) };
    }
  }
  return { kind: "ping" };
}

function formatIssues(
  error: z.ZodError
): { path: string; message: string }[] {
  return error.issues.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Policy number for a row that arrives without one: `AUTO-yyyyMMddHHmmss`
 * in UTC.
 */
export function autoPolicyNumber(now: Date): string {
  return `AUTO-${now.toISOString().replace(/[-:T]/g, "").slice(0, 14)}`;
}

/**
 * Wire form of a result: score rounded to 4 places, timing to 2.
 */
export function toPredictionResponse(
  result: PredictionResult
): PredictionResponse {
  return {
    policy_number: result.policyNumber,
    risk_score: round(result.riskScore, 4),
    risk_level: result.riskLevel,
    model_version: result.modelVersion,
    inference_ms: round(result.inferenceMs, 2),
    feature_count: result.featureCount,
    features: {
      mib: result.features.mib,
      rx: result.features.rx,
    },
  };
}

/**
 * Scores every row independently and returns the results under the row
 * indexes they arrived with, in the same order.
 */
export async function predictBatch(
  rows: BatchRow[],
  ctx: ScoringContext,
  now: Date = new Date()
): Promise<BatchResponse<PredictionResponse>> {
  const data = await Promise.all(
    rows.map(async (row): Promise<[number, PredictionResponse]> => {
      const [rowIndex, policyNumber, mibXml, rxXml] = row;
      const result = await predictRisk(
        {
          policyNumber: policyNumber || autoPolicyNumber(now),
          mibXml,
          rxXml,
        },
        ctx
      );
      return [rowIndex, toPredictionResponse(result)];
    })
  );
  return { data };
}

export function pingResponse(): PingResponse {
  return {
    data: [[0, { status: "ok", message: "Send rows under `data` to score" }]],
  };
}

export function healthResponse(
  now: Date = new Date()
): BatchResponse<{ status: string; timestamp: string }> {
  return { data: [[0, { status: "healthy", timestamp: now.toISOString() }]] };
}
