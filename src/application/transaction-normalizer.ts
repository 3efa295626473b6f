import { assertTransactionInput } from "../api/validators.js";
import type { NormalizedTransaction } from "../domain/types.js";

function trimmedOrNull(value: string | null | undefined): string | null {
  return value === undefined || value === null ? null : value.trim();
}

export function normalizeTransaction(payload: unknown): NormalizedTransaction {
  assertTransactionInput(payload);

  return {
    transaction_id: payload.transaction_id,
    amount_mxn: payload.amount_mxn ?? 0,
    customer_txn_30d: payload.customer_txn_30d ?? 0,
    geo_state: trimmedOrNull(payload.geo_state),
    device_type: trimmedOrNull(payload.device_type),
    chargeback_count: payload.chargeback_count ?? 0,
    hour: payload.hour ?? null,
    product_type: trimmedOrNull(payload.product_type),
    latency_ms: payload.latency_ms ?? 0,
    user_reputation: trimmedOrNull(payload.user_reputation) ?? "new",
    device_fingerprint_risk: payload.device_fingerprint_risk ?? "low",
    ip_risk: payload.ip_risk ?? "low",
    email_risk: trimmedOrNull(payload.email_risk) ?? "low",
    bin_country: trimmedOrNull(payload.bin_country),
    ip_country: trimmedOrNull(payload.ip_country),
  };
}
