import { ConfigurationError } from "../infra/app-error.js";
import { isDecision, isMoreSevere } from "./decision.js";
import type {
  RiskLevel,
  RuleWeights,
  ScoreThreshold,
  ScoringConfig,
  ScoringConfigSnapshot,
} from "./types.js";

export const RISK_LEVELS: readonly RiskLevel[] = ["low", "medium", "high"];

export const DEFAULT_PRODUCT_KEY = "_default";

const DEFAULT_HARD_BLOCK_IP_RISK_LEVELS: readonly RiskLevel[] = ["high"];

export const DEFAULT_REJECT_AT = 10;
export const DEFAULT_REVIEW_AT = 4;

export const DEFAULT_AMOUNT_THRESHOLDS: Readonly<Record<string, number>> = {
  digital: 2500,
  physical: 6000,
  subscription: 1500,
  [DEFAULT_PRODUCT_KEY]: 4000,
};

export const DEFAULT_RULE_WEIGHTS: RuleWeights = {
  highAmount: 2,
  newUserHighAmount: 2,
  nightHour: 1,
  geoMismatch: 2,
  latencyExtreme: 2,
  frequencyBuffer: -1,
  ipRisk: { low: 0, medium: 2, high: 3 },
  deviceFingerprintRisk: { low: 0, medium: 1, high: 3 },
  emailRisk: { low: 0, new_domain: 1, medium: 1, high: 3 },
};

type ScalarWeight = Exclude<keyof RuleWeights, "ipRisk" | "deviceFingerprintRisk" | "emailRisk">;

export interface RuleWeightOverrides extends Partial<Pick<RuleWeights, ScalarWeight>> {
  ipRisk?: Partial<Record<RiskLevel, number>>;
  deviceFingerprintRisk?: Partial<Record<RiskLevel, number>>;
  emailRisk?: Record<string, number>;
}

export interface ScoringConfigOverrides {
  /** Full threshold table; takes precedence over `rejectAt` / `reviewAt`. */
  scoreToDecision?: ScoreThreshold[];
  rejectAt?: number;
  reviewAt?: number;
  /** Merged over the defaults. */
  amountThresholds?: Record<string, number>;
  weights?: RuleWeightOverrides;
  nightWindow?: { startHour: number; endHour: number };
  latencyExtremeMs?: number;
  frequencyBuffer?: { reputation?: string; minTransactions30d?: number };
  hardBlock?: { minChargebacks?: number; ipRiskLevels?: RiskLevel[] };
}

function assertInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`'${name}' must be an integer between ${min} and ${max}.`);
  }
}

function buildScoreToDecision(overrides: ScoringConfigOverrides): ScoreThreshold[] {
  if (overrides.scoreToDecision) {
    return overrides.scoreToDecision
      .map(({ threshold, decision }) => ({ threshold, decision }))
      .sort((a, b) => b.threshold - a.threshold);
  }
  const rejectAt = overrides.rejectAt ?? DEFAULT_REJECT_AT;
  const reviewAt = overrides.reviewAt ?? DEFAULT_REVIEW_AT;
  assertInteger("reject_at", rejectAt, 1);
  assertInteger("review_at", reviewAt, 1);
  if (reviewAt >= rejectAt) {
    throw new ConfigurationError("'review_at' must be lower than 'reject_at'.");
  }
  return [
    { threshold: rejectAt, decision: "REJECTED" },
    { threshold: reviewAt, decision: "IN_REVIEW" },
  ];
}

function assertScoreToDecision(table: ScoreThreshold[]): void {
  if (table.length === 0) {
    throw new ConfigurationError("'score_to_decision' must contain at least one threshold.");
  }
  for (const [index, entry] of table.entries()) {
    assertInteger("score_to_decision.threshold", entry.threshold, 0);
    if (!isDecision(entry.decision)) {
      throw new ConfigurationError(
        `'score_to_decision' maps ${entry.threshold} to unknown decision '${String(entry.decision)}'.`,
      );
    }
    const higher = table[index - 1];
    if (!higher) {
      continue;
    }
    if (higher.threshold === entry.threshold) {
      throw new ConfigurationError(`'score_to_decision' repeats threshold ${entry.threshold}.`);
    }
    if (isMoreSevere(entry.decision, higher.decision)) {
      throw new ConfigurationError(
        `'score_to_decision' maps ${entry.threshold} to ${entry.decision}, more severe than ${higher.decision} at ${higher.threshold}.`,
      );
    }
  }
}

function buildAmountThresholds(overrides: Record<string, number> | undefined): Record<string, number> {
  const merged = { ...DEFAULT_AMOUNT_THRESHOLDS, ...(overrides ?? {}) };
  for (const [product, amount] of Object.entries(merged)) {
    if (product.trim().length === 0) {
      throw new ConfigurationError("'amount_thresholds' keys must be non-empty product types.");
    }
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ConfigurationError(`'amount_thresholds.${product}' must be a non-negative number.`);
    }
  }
  return merged;
}

function buildWeights(overrides: RuleWeightOverrides | undefined): RuleWeights {
  const weights: RuleWeights = {
    highAmount: overrides?.highAmount ?? DEFAULT_RULE_WEIGHTS.highAmount,
    newUserHighAmount: overrides?.newUserHighAmount ?? DEFAULT_RULE_WEIGHTS.newUserHighAmount,
    nightHour: overrides?.nightHour ?? DEFAULT_RULE_WEIGHTS.nightHour,
    geoMismatch: overrides?.geoMismatch ?? DEFAULT_RULE_WEIGHTS.geoMismatch,
    latencyExtreme: overrides?.latencyExtreme ?? DEFAULT_RULE_WEIGHTS.latencyExtreme,
    frequencyBuffer: overrides?.frequencyBuffer ?? DEFAULT_RULE_WEIGHTS.frequencyBuffer,
    ipRisk: { ...DEFAULT_RULE_WEIGHTS.ipRisk, ...(overrides?.ipRisk ?? {}) },
    deviceFingerprintRisk: {
      ...DEFAULT_RULE_WEIGHTS.deviceFingerprintRisk,
      ...(overrides?.deviceFingerprintRisk ?? {}),
    },
    emailRisk: { ...DEFAULT_RULE_WEIGHTS.emailRisk, ...(overrides?.emailRisk ?? {}) },
  };

  assertInteger("weights.high_amount", weights.highAmount, 0);
  assertInteger("weights.new_user_high_amount", weights.newUserHighAmount, 0);
  assertInteger("weights.night_hour", weights.nightHour, 0);
  assertInteger("weights.geo_mismatch", weights.geoMismatch, 0);
  assertInteger("weights.latency_extreme", weights.latencyExtreme, 0);
  // The buffer is the only rule allowed to lower the score.
  assertInteger("weights.frequency_buffer", weights.frequencyBuffer, Number.MIN_SAFE_INTEGER, 0);
  for (const [group, table] of [
    ["ip_risk", weights.ipRisk],
    ["device_fingerprint_risk", weights.deviceFingerprintRisk],
    ["email_risk", weights.emailRisk],
  ] as const) {
    for (const [level, weight] of Object.entries(table)) {
      assertInteger(`weights.${group}.${level}`, weight, 0);
    }
  }
  return weights;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function createScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  const scoreToDecision = buildScoreToDecision(overrides);
  assertScoreToDecision(scoreToDecision);

  const nightWindow = overrides.nightWindow ?? { startHour: 22, endHour: 6 };
  assertInteger("night_window.start_hour", nightWindow.startHour, 0, 23);
  assertInteger("night_window.end_hour", nightWindow.endHour, 0, 23);
  if (nightWindow.startHour === nightWindow.endHour) {
    throw new ConfigurationError("'night_window' start and end hours must differ.");
  }

  const latencyExtremeMs = overrides.latencyExtremeMs ?? 2500;
  assertInteger("latency_extreme_ms", latencyExtremeMs, 1);

  const frequencyBuffer = {
    reputation: overrides.frequencyBuffer?.reputation ?? "recurrent",
    minTransactions30d: overrides.frequencyBuffer?.minTransactions30d ?? 3,
  };
  if (frequencyBuffer.reputation.trim().length === 0) {
    throw new ConfigurationError("'frequency_buffer.reputation' must be non-empty.");
  }
  assertInteger("frequency_buffer.min_transactions_30d", frequencyBuffer.minTransactions30d, 1);

  const hardBlock = {
    minChargebacks: overrides.hardBlock?.minChargebacks ?? 2,
    ipRiskLevels: [...new Set(overrides.hardBlock?.ipRiskLevels ?? DEFAULT_HARD_BLOCK_IP_RISK_LEVELS)],
  };
  assertInteger("hard_block.min_chargebacks", hardBlock.minChargebacks, 1);
  if (hardBlock.ipRiskLevels.length === 0) {
    throw new ConfigurationError("'hard_block.ip_risk_levels' must contain at least one level.");
  }

  return deepFreeze({
    scoreToDecision,
    amountThresholds: buildAmountThresholds(overrides.amountThresholds),
    weights: buildWeights(overrides.weights),
    nightWindow: { ...nightWindow },
    latencyExtremeMs,
    frequencyBuffer,
    hardBlock,
  });
}

export function describeScoringConfig(
  config: ScoringConfig,
  ruleNames: readonly string[],
  hardBlockNames: readonly string[],
): ScoringConfigSnapshot {
  const { weights } = config;
  return {
    score_to_decision: config.scoreToDecision.map(({ threshold, decision }) => ({ threshold, decision })),
    amount_thresholds: { ...config.amountThresholds },
    weights: {
      high_amount: weights.highAmount,
      new_user_high_amount: weights.newUserHighAmount,
      night_hour: weights.nightHour,
      geo_mismatch: weights.geoMismatch,
      latency_extreme: weights.latencyExtreme,
      frequency_buffer: weights.frequencyBuffer,
      ip_risk: { ...weights.ipRisk },
      device_fingerprint_risk: { ...weights.deviceFingerprintRisk },
      email_risk: { ...weights.emailRisk },
    },
    night_window: { start_hour: config.nightWindow.startHour, end_hour: config.nightWindow.endHour },
    latency_extreme_ms: config.latencyExtremeMs,
    frequency_buffer: {
      reputation: config.frequencyBuffer.reputation,
      min_transactions_30d: config.frequencyBuffer.minTransactions30d,
    },
    hard_block: {
      min_chargebacks: config.hardBlock.minChargebacks,
      ip_risk_levels: [...config.hardBlock.ipRiskLevels],
    },
    hard_block_predicates: [...hardBlockNames],
    rules: [...ruleNames],
  };
}
