export type Decision = "ACCEPTED" | "IN_REVIEW" | "REJECTED";

export type RiskLevel = "low" | "medium" | "high";

export interface TransactionInput {
  transaction_id: number;
  amount_mxn?: number | null;
  customer_txn_30d?: number | null;
  geo_state?: string | null;
  device_type?: string | null;
  chargeback_count?: number | null;
  hour?: number | null;
  product_type?: string | null;
  latency_ms?: number | null;
  user_reputation?: string | null;
  device_fingerprint_risk?: RiskLevel | null;
  ip_risk?: RiskLevel | null;
  email_risk?: string | null;
  bin_country?: string | null;
  ip_country?: string | null;
}

export interface NormalizedTransaction {
  transaction_id: number;
  amount_mxn: number;
  customer_txn_30d: number;
  geo_state: string | null;
  device_type: string | null;
  chargeback_count: number;
  hour: number | null;
  product_type: string | null;
  latency_ms: number;
  user_reputation: string;
  device_fingerprint_risk: RiskLevel;
  ip_risk: RiskLevel;
  email_risk: string;
  bin_country: string | null;
  ip_country: string | null;
}

export interface ScoreSignal {
  readonly rule: string;
  readonly reason: string;
  readonly delta: number;
}

export interface ScoreThreshold {
  readonly threshold: number;
  readonly decision: Decision;
}

export interface RuleWeights {
  readonly highAmount: number;
  readonly newUserHighAmount: number;
  readonly nightHour: number;
  readonly geoMismatch: number;
  readonly latencyExtreme: number;
  readonly frequencyBuffer: number;
  readonly ipRisk: Readonly<Record<RiskLevel, number>>;
  readonly deviceFingerprintRisk: Readonly<Record<RiskLevel, number>>;
  readonly emailRisk: Readonly<Record<string, number>>;
}

export interface ScoringConfig {
  /** Sorted by threshold, highest first. */
  readonly scoreToDecision: readonly ScoreThreshold[];
  /** Keyed by product type; `_default` covers missing or unlisted products. */
  readonly amountThresholds: Readonly<Record<string, number>>;
  readonly weights: RuleWeights;
  readonly nightWindow: { readonly startHour: number; readonly endHour: number };
  readonly latencyExtremeMs: number;
  readonly frequencyBuffer: { readonly reputation: string; readonly minTransactions30d: number };
  readonly hardBlock: { readonly minChargebacks: number; readonly ipRiskLevels: readonly RiskLevel[] };
}

export interface RiskEvaluation {
  transaction_id: number;
  risk_score: number;
  decision: Decision;
  reasons: string[];
  hard_blocks: string[];
}

export interface ScoringConfigSnapshot {
  score_to_decision: Array<{ threshold: number; decision: Decision }>;
  amount_thresholds: Record<string, number>;
  weights: {
    high_amount: number;
    new_user_high_amount: number;
    night_hour: number;
    geo_mismatch: number;
    latency_extreme: number;
    frequency_buffer: number;
    ip_risk: Record<string, number>;
    device_fingerprint_risk: Record<string, number>;
    email_risk: Record<string, number>;
  };
  night_window: { start_hour: number; end_hour: number };
  latency_extreme_ms: number;
  frequency_buffer: { reputation: string; min_transactions_30d: number };
  hard_block: { min_chargebacks: number; ip_risk_levels: RiskLevel[] };
  hard_block_predicates: string[];
  rules: string[];
}
