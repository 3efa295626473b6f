import { DEFAULT_PRODUCT_KEY } from "./scoring-config.js";
import type { NormalizedTransaction, ScoreSignal, ScoringConfig } from "./types.js";

/**
 * A named, pure evaluator over a normalized transaction. Rules share no state,
 * so the registry order only affects the order of the emitted reasons.
 */
export interface RiskRule {
  readonly name: string;
  evaluate(transaction: NormalizedTransaction, config: ScoringConfig): ScoreSignal | null;
}

export function formatDelta(delta: number): string {
  return delta >= 0 ? `(+${delta})` : `(${delta})`;
}

function signal(rule: string, label: string, delta: number): ScoreSignal | null {
  if (delta === 0) {
    return null;
  }
  return Object.freeze({ rule, reason: `${label}${formatDelta(delta)}`, delta });
}

/**
 * Reads a table entry keyed by request data. Only own entries count, so keys
 * such as `constructor` or `__proto__` fall through to the caller's default.
 */
export function ownEntry(table: Readonly<Record<string, number>>, key: string | null): number | undefined {
  if (key === null || !Object.hasOwn(table, key)) {
    return undefined;
  }
  return table[key];
}

export function amountThresholdFor(productType: string | null, config: ScoringConfig): number {
  return (
    ownEntry(config.amountThresholds, productType) ??
    ownEntry(config.amountThresholds, DEFAULT_PRODUCT_KEY) ??
    Number.POSITIVE_INFINITY
  );
}

function isHighAmount(transaction: NormalizedTransaction, config: ScoringConfig): boolean {
  return transaction.amount_mxn > amountThresholdFor(transaction.product_type, config);
}

export function isNightHour(hour: number, config: ScoringConfig): boolean {
  const { startHour, endHour } = config.nightWindow;
  if (startHour > endHour) {
    return hour >= startHour || hour < endHour;
  }
  return hour >= startHour && hour < endHour;
}

export const highAmountRule: RiskRule = {
  name: "high_amount",
  evaluate(transaction, config) {
    if (!isHighAmount(transaction, config)) {
      return null;
    }
    const product = transaction.product_type ?? "unknown";
    return signal("high_amount", `high_amount:${product}:${transaction.amount_mxn}`, config.weights.highAmount);
  },
};

export const newUserHighAmountRule: RiskRule = {
  name: "new_user_high_amount",
  evaluate(transaction, config) {
    if (transaction.user_reputation !== "new" || !isHighAmount(transaction, config)) {
      return null;
    }
    return signal("new_user_high_amount", "new_user_high_amount", config.weights.newUserHighAmount);
  },
};

export const nightHourRule: RiskRule = {
  name: "night_hour",
  evaluate(transaction, config) {
    if (transaction.hour === null || !isNightHour(transaction.hour, config)) {
      return null;
    }
    return signal("night_hour", `night_hour:${transaction.hour}`, config.weights.nightHour);
  },
};

export const geoMismatchRule: RiskRule = {
  name: "geo_mismatch",
  evaluate(transaction, config) {
    if (transaction.bin_country === null || transaction.ip_country === null) {
      return null;
    }
    const bin = transaction.bin_country.toUpperCase();
    const ip = transaction.ip_country.toUpperCase();
    if (bin === ip) {
      return null;
    }
    return signal("geo_mismatch", `geo_mismatch:${bin}!=${ip}`, config.weights.geoMismatch);
  },
};

export const latencyExtremeRule: RiskRule = {
  name: "latency_extreme",
  evaluate(transaction, config) {
    if (transaction.latency_ms < config.latencyExtremeMs) {
      return null;
    }
    return signal("latency_extreme", `latency_extreme:${transaction.latency_ms}ms`, config.weights.latencyExtreme);
  },
};

export const ipRiskRule: RiskRule = {
  name: "ip_risk",
  evaluate(transaction, config) {
    const weight = config.weights.ipRisk[transaction.ip_risk];
    return signal("ip_risk", `ip_risk:${transaction.ip_risk}`, weight);
  },
};

export const deviceFingerprintRiskRule: RiskRule = {
  name: "device_fingerprint_risk",
  evaluate(transaction, config) {
    const weight = config.weights.deviceFingerprintRisk[transaction.device_fingerprint_risk];
    return signal("device_fingerprint_risk", `device_fingerprint_risk:${transaction.device_fingerprint_risk}`, weight);
  },
};

export const emailRiskRule: RiskRule = {
  name: "email_risk",
  evaluate(transaction, config) {
    // Levels without a configured weight carry no risk.
    const weight = ownEntry(config.weights.emailRisk, transaction.email_risk) ?? 0;
    return signal("email_risk", `email_risk:${transaction.email_risk}`, weight);
  },
};

export const frequencyBufferRule: RiskRule = {
  name: "frequency_buffer",
  evaluate(transaction, config) {
    const { reputation, minTransactions30d } = config.frequencyBuffer;
    if (transaction.user_reputation !== reputation || transaction.customer_txn_30d < minTransactions30d) {
      return null;
    }
    return signal("frequency_buffer", "frequency_buffer", config.weights.frequencyBuffer);
  },
};

export const DEFAULT_RULES: readonly RiskRule[] = [
  highAmountRule,
  newUserHighAmountRule,
  nightHourRule,
  geoMismatchRule,
  latencyExtremeRule,
  ipRiskRule,
  deviceFingerprintRiskRule,
  emailRiskRule,
  frequencyBufferRule,
];
