import { readFileSync, writeFileSync } from "node:fs";
import { ConfigError, loadConfig } from "./config";
import { toPredictionResponse } from "./predict";
import { createScoringContext, predictRisk } from "./scoring";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--mib mib.xml`
 * - `--mib=mib.xml`
 *
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * Reads an evidence document, or returns `null` when no path was given.
 */
function readDocument(path: string | null): string | null {
  if (!path) return null;
  return readFileSync(path, "utf8");
}

/**
 * CLI entrypoint.
 *
 * Scores one policy from XML files on disk:
 *
 *   tsx src/cli.ts --policy TEST-001 --mib mib.xml --rx rx.xml
 *
 * `--strategy rule-based|remote` overrides `SCORING_STRATEGY` for this run.
 * The prediction is printed as JSON, and also written to `--out` if given.
 */
export async function runCli(): Promise<void> {
  const strategy = getArgValue("--strategy");
  const config = loadConfig(
    strategy ? { ...process.env, SCORING_STRATEGY: strategy } : process.env
  );

  const mibPath = getArgValue("--mib");
  const rxPath = getArgValue("--rx");
  if (!mibPath && !rxPath) {
    console.warn("No --mib or --rx document given; scoring with defaults.");
  }

  const policyNumber = getArgValue("--policy") || "CLI-001";
  const result = await predictRisk(
    {
      policyNumber,
      mibXml: readDocument(mibPath),
      rxXml: readDocument(rxPath),
    },
    createScoringContext(config)
  );

  const json = JSON.stringify(toPredictionResponse(result), null, 2);
  const outPath = getArgValue("--out");
  if (outPath) {
    writeFileSync(outPath, json, "utf8");
    console.log(`Wrote ${outPath}`);
  } else {
    console.log(json);
  }

  console.log(
    `\n${policyNumber}: ${result.riskLevel} (${result.riskScore.toFixed(4)}, ${result.modelVersion})`
  );
}

runCli().catch((err) => {
  if (err instanceof ConfigError) console.error(err.message);
  else console.error("Fatal error:", err);
  process.exit(1);
});
