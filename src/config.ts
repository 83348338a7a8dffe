import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const projectRoot = path.resolve(__dirname, "..");

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toList = (value: string | undefined, fallback: string[]): string[] => {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
};

export type BusyPolicy = "queue" | "reject";

const toBusyPolicy = (value: string | undefined): BusyPolicy => (value === "reject" ? "reject" : "queue");

export const config = {
  port: toInt(process.env.PORT, 3000),
  logLevel: process.env.LOG_LEVEL ?? "info",
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "http://localhost:8000/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4.1-mini",
  corpusPath: path.resolve(process.env.CORPUS_PATH ?? path.join(projectRoot, "data", "cases.json")),
  lexiconPath: path.resolve(process.env.LEXICON_PATH ?? path.join(projectRoot, "data", "lexicon.json")),
  timeouts: {
    gateMs: toInt(process.env.GATE_TIMEOUT_MS, 20_000),
    diagnoseMs: toInt(process.env.DIAGNOSE_TIMEOUT_MS, 45_000),
    reviewMs: toInt(process.env.REVIEW_TIMEOUT_MS, 20_000),
    retrievalMs: toInt(process.env.RETRIEVAL_TIMEOUT_MS, 10_000)
  },
  reasoningRetryBudget: toInt(process.env.REASONING_RETRY_BUDGET, 1),
  retrieval: {
    candidateCount: toInt(process.env.SPIRAL_CANDIDATE_COUNT, 3),
    overfetchFactor: toInt(process.env.SPIRAL_OVERFETCH_FACTOR, 3),
    fallbackFields: toList(process.env.SPIRAL_FALLBACK_FIELDS, ["search_tokens", "syndrome_terms", "symptom_terms"]),
    hybridAlpha: toFloat(process.env.SPIRAL_HYBRID_ALPHA, 0.5)
  },
  selector: {
    weights: {
      similarity: toFloat(process.env.SELECTOR_WEIGHT_SIMILARITY, 0.4),
      symptom: toFloat(process.env.SELECTOR_WEIGHT_SYMPTOM, 0.3),
      tonguePulse: toFloat(process.env.SELECTOR_WEIGHT_TONGUE_PULSE, 0.2),
      specificity: toFloat(process.env.SELECTOR_WEIGHT_SPECIFICITY, 0.1)
    },
    tieBreakGap: toFloat(process.env.SELECTOR_TIE_BREAK_GAP, 0.08),
    regressionThreshold: toFloat(process.env.SELECTOR_REGRESSION_THRESHOLD, 0.2)
  },
  convergence: {
    maxRounds: toInt(process.env.SPIRAL_MAX_ROUNDS, 7),
    coverageThreshold: toFloat(process.env.CONVERGENCE_COVERAGE_THRESHOLD, 0.8),
    forcedThreshold: toFloat(process.env.CONVERGENCE_FORCED_THRESHOLD, 0.75),
    weights: {
      coverage: toFloat(process.env.CONVERGENCE_WEIGHT_COVERAGE, 0.5),
      anchor: toFloat(process.env.CONVERGENCE_WEIGHT_ANCHOR, 0.3),
      round: toFloat(process.env.CONVERGENCE_WEIGHT_ROUND, 0.2)
    },
    roundPenaltyStep: toFloat(process.env.CONVERGENCE_ROUND_PENALTY_STEP, 0.1),
    roundPenaltyCap: toFloat(process.env.CONVERGENCE_ROUND_PENALTY_CAP, 0.5),
    followUpLow: toFloat(process.env.CONVERGENCE_FOLLOWUP_LOW, 0.45),
    followUpMid: toFloat(process.env.CONVERGENCE_FOLLOWUP_MID, 0.7)
  },
  sessions: {
    maxResident: toInt(process.env.SESSION_MAX_RESIDENT, 1000),
    idleMs: toInt(process.env.SESSION_IDLE_MS, 30 * 60_000),
    reapIntervalMs: toInt(process.env.SESSION_REAP_INTERVAL_MS, 60_000),
    busyPolicy: toBusyPolicy(process.env.SESSION_BUSY_POLICY)
  }
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
