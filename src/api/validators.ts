import type { RiskLevel, TransactionInput } from "../domain/types.js";
import { RISK_LEVELS } from "../domain/scoring-config.js";
import { InvalidInputError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

function isRiskLevel(value: unknown): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

function invalidField(field: string, expectation: string): InvalidInputError {
  return new InvalidInputError(`invalid_${field}`, `'${field}' ${expectation}.`);
}

function assertOptionalNonNegativeInteger(payload: Record<string, unknown>, field: string): void {
  const value = payload[field];
  if (isAbsent(value)) {
    return;
  }
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw invalidField(field, "must be a non-negative integer");
  }
}

function assertOptionalString(payload: Record<string, unknown>, field: string): void {
  const value = payload[field];
  if (isAbsent(value)) {
    return;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    throw invalidField(field, "must be a non-empty string");
  }
}

function assertOptionalRiskLevel(payload: Record<string, unknown>, field: string): void {
  const value = payload[field];
  if (isAbsent(value)) {
    return;
  }
  if (!isRiskLevel(value)) {
    throw invalidField(field, `must be one of: ${RISK_LEVELS.join(", ")}`);
  }
}

/**
 * Shape and domain check for a scoring request. Values are never coerced:
 * `"5"` for an integer field or `-1` for an amount is a rejection.
 */
export function assertTransactionInput(payload: unknown): asserts payload is TransactionInput {
  if (!isObject(payload)) {
    throw new InvalidInputError("invalid_request_body", "Request body must be an object.", 400);
  }

  const { transaction_id, amount_mxn, hour } = payload;

  if (isAbsent(transaction_id)) {
    throw new InvalidInputError("missing_transaction_id", "'transaction_id' is required.");
  }
  if (typeof transaction_id !== "number" || !Number.isSafeInteger(transaction_id)) {
    throw invalidField("transaction_id", "must be an integer");
  }

  if (!isAbsent(amount_mxn) && (typeof amount_mxn !== "number" || !Number.isFinite(amount_mxn) || amount_mxn < 0)) {
    throw invalidField("amount_mxn", "must be a non-negative number");
  }

  if (!isAbsent(hour) && (typeof hour !== "number" || !Number.isInteger(hour) || hour < 0 || hour > 23)) {
    throw invalidField("hour", "must be an integer between 0 and 23");
  }

  assertOptionalNonNegativeInteger(payload, "customer_txn_30d");
  assertOptionalNonNegativeInteger(payload, "chargeback_count");
  assertOptionalNonNegativeInteger(payload, "latency_ms");

  assertOptionalString(payload, "geo_state");
  assertOptionalString(payload, "device_type");
  assertOptionalString(payload, "product_type");
  assertOptionalString(payload, "user_reputation");
  assertOptionalString(payload, "email_risk");
  assertOptionalString(payload, "bin_country");
  assertOptionalString(payload, "ip_country");

  assertOptionalRiskLevel(payload, "device_fingerprint_risk");
  assertOptionalRiskLevel(payload, "ip_risk");
}
