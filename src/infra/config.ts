import {
  createScoringConfig,
  DEFAULT_AMOUNT_THRESHOLDS,
  DEFAULT_REJECT_AT,
  DEFAULT_REVIEW_AT,
  DEFAULT_RULE_WEIGHTS,
  RISK_LEVELS,
} from "../domain/scoring-config.js";
import type { RiskLevel, ScoringConfig } from "../domain/types.js";
import { ConfigurationError } from "./app-error.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function invalidConfig(name: string, expectation: string): ConfigurationError {
  return new ConfigurationError(`Environment variable '${name}' ${expectation}.`);
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (raw.trim().length === 0 || !Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseEnumListEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: readonly TValue[],
): TValue[] {
  const raw = process.env[name];
  if (raw === undefined) {
    return [...defaultValue];
  }
  const items = raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  const values: TValue[] = [];
  for (const item of items) {
    const match = allowedValues.find((value) => value === item);
    if (match === undefined) {
      throw invalidConfig(name, `items must be one of: ${allowedValues.join(", ")}`);
    }
    values.push(match);
  }
  return [...new Set(values)];
}

/**
 * Reads `key:number` pairs, e.g. `digital:2500,physical:6000`, merged over `defaults`.
 */
function parseNumberMapEnv(
  name: string,
  defaults: Readonly<Record<string, number>>,
  options: { integer: boolean; allowedKeys?: readonly string[] },
): Record<string, number> {
  const merged: Record<string, number> = { ...defaults };
  const raw = process.env[name];
  if (raw === undefined) {
    return merged;
  }
  const pairs = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (pairs.length === 0) {
    throw invalidConfig(name, "must contain at least one 'key:value' pair");
  }
  for (const pair of pairs) {
    const separator = pair.lastIndexOf(":");
    const key = pair.slice(0, separator).trim();
    const rawValue = pair.slice(separator + 1).trim();
    const value = Number(rawValue);
    if (separator <= 0 || key.length === 0 || rawValue.length === 0) {
      throw invalidConfig(name, "items must look like 'key:value'");
    }
    if (options.allowedKeys && !options.allowedKeys.includes(key)) {
      throw invalidConfig(name, `keys must be one of: ${options.allowedKeys.join(", ")}`);
    }
    if (!Number.isFinite(value) || value < 0 || (options.integer && !Number.isInteger(value))) {
      throw invalidConfig(name, `value for '${key}' must be a non-negative ${options.integer ? "integer" : "number"}`);
    }
    merged[key] = value;
  }
  return merged;
}

function parseRiskLevelWeightsEnv(
  name: string,
  defaults: Readonly<Record<RiskLevel, number>>,
): Record<RiskLevel, number> {
  const parsed = parseNumberMapEnv(name, defaults, { integer: true, allowedKeys: RISK_LEVELS });
  return {
    low: parsed.low ?? defaults.low,
    medium: parsed.medium ?? defaults.medium,
    high: parsed.high ?? defaults.high,
  };
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  scoring: ScoringConfig;
}

export function loadScoringConfig(): ScoringConfig {
  const weights = DEFAULT_RULE_WEIGHTS;
  const rejectAt = parseIntegerEnv("REJECT_AT", DEFAULT_REJECT_AT, 1, 1_000_000);
  const reviewAt = parseIntegerEnv("REVIEW_AT", DEFAULT_REVIEW_AT, 1, 1_000_000);
  if (reviewAt >= rejectAt) {
    throw invalidConfig("REVIEW_AT", "must be lower than REJECT_AT");
  }

  return createScoringConfig({
    rejectAt,
    reviewAt,
    amountThresholds: parseNumberMapEnv("RISK_AMOUNT_THRESHOLDS", DEFAULT_AMOUNT_THRESHOLDS, {
      integer: false,
    }),
    weights: {
      highAmount: parseIntegerEnv("RISK_WEIGHT_HIGH_AMOUNT", weights.highAmount, 0, 1000),
      newUserHighAmount: parseIntegerEnv("RISK_WEIGHT_NEW_USER_HIGH_AMOUNT", weights.newUserHighAmount, 0, 1000),
      nightHour: parseIntegerEnv("RISK_WEIGHT_NIGHT_HOUR", weights.nightHour, 0, 1000),
      geoMismatch: parseIntegerEnv("RISK_WEIGHT_GEO_MISMATCH", weights.geoMismatch, 0, 1000),
      latencyExtreme: parseIntegerEnv("RISK_WEIGHT_LATENCY_EXTREME", weights.latencyExtreme, 0, 1000),
      frequencyBuffer: parseIntegerEnv("RISK_WEIGHT_FREQUENCY_BUFFER", weights.frequencyBuffer, -1000, 0),
      ipRisk: parseRiskLevelWeightsEnv("RISK_IP_RISK_WEIGHTS", weights.ipRisk),
      deviceFingerprintRisk: parseRiskLevelWeightsEnv("RISK_DEVICE_RISK_WEIGHTS", weights.deviceFingerprintRisk),
      emailRisk: parseNumberMapEnv("RISK_EMAIL_RISK_WEIGHTS", weights.emailRisk, { integer: true }),
    },
    nightWindow: {
      startHour: parseIntegerEnv("RISK_NIGHT_START_HOUR", 22, 0, 23),
      endHour: parseIntegerEnv("RISK_NIGHT_END_HOUR", 6, 0, 23),
    },
    latencyExtremeMs: parseIntegerEnv("RISK_LATENCY_EXTREME_MS", 2500, 1, 600_000),
    frequencyBuffer: {
      reputation: parseStringEnv("RISK_FREQUENCY_REPUTATION", "recurrent", 1),
      minTransactions30d: parseIntegerEnv("RISK_FREQUENCY_MIN_TXN_30D", 3, 1, 100_000),
    },
    hardBlock: {
      minChargebacks: parseIntegerEnv("RISK_HARD_BLOCK_MIN_CHARGEBACKS", 2, 1, 1000),
      ipRiskLevels: parseEnumListEnv("RISK_HARD_BLOCK_IP_RISK_LEVELS", RISK_LEVELS, ["high"]),
    },
  });
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv("LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("RISK_METRICS_ENABLED", true);

  return {
    host,
    port,
    logLevel,
    metricsEnabled,
    scoring: loadScoringConfig(),
  };
}
